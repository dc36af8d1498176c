import { Redis } from "ioredis"
import { Logger } from "pino"
import { KeyValueStore } from "../ports/key-value-store"
import { ServerAddress } from "../core/types"
import { ConnectionError } from "../core/errors"
import { createLogger } from "../logger"

export type RedisCommands = Pick<Redis, "status" | "getBuffer" | "set" | "del" | "keys" | "pttl" | "flushall" | "quit">

export class RedisKeyValueStore implements KeyValueStore {
    constructor(
        private readonly client: RedisCommands,
        private readonly logger: Logger,
        private readonly address: ServerAddress
    ) {}

    isOpen(): boolean {
        return this.client.status !== "end"
    }

    async get(key: string): Promise<Buffer | null> {
        return await this.run(() => this.client.getBuffer(key))
    }

    async set(key: string, value: Buffer, expiryMs?: number): Promise<boolean> {
        const reply = await this.run(() => expiryMs === undefined
            ? this.client.set(key, value)
            : this.client.set(key, value, "PX", expiryMs))

        return reply === "OK"
    }

    setNoReply(key: string, value: Buffer, expiryMs?: number): void {
        this.set(key, value, expiryMs)
            .catch((err: unknown) => {
                this.logger.debug({ err, key }, "discarded fire-and-forget write failure")
            })
    }

    async del(keys: string[]): Promise<number> {
        if (keys.length === 0) {
            return 0
        }
        return await this.run(() => this.client.del(...keys))
    }

    async keys(pattern: string): Promise<string[]> {
        return await this.run(() => this.client.keys(pattern))
    }

    async pttl(key: string): Promise<number> {
        return await this.run(() => this.client.pttl(key))
    }

    async flushall(): Promise<void> {
        await this.run(() => this.client.flushall())
    }

    async close(): Promise<void> {
        if (this.isOpen()) {
            await this.client.quit()
        }
    }

    // a reply error from a ready client belongs to the command, anything else to the connection
    private async run<T>(command: () => Promise<T>): Promise<T> {
        try {
            return await command()
        } catch (err) {
            if (this.client.status === "ready") {
                throw err
            }
            throw new ConnectionError(this.address, { cause: err })
        }
    }
}

export interface RedisConnectionOptions {
    reconnectAttempts?: number
    logger?: Logger
}

export const defaultReconnectAttempts = 3

export function reconnectDelay(attempt: number, maxAttempts: number): number | null {
    if (attempt > maxAttempts) {
        return null
    }
    return Math.min(attempt * 200, 2000)
}

/**
 * Resolves true once the client is ready, false once it has given up
 * reconnecting.
 */
function settled(client: Redis): Promise<boolean> {
    if (client.status === "ready") {
        return Promise.resolve(true)
    }
    if (client.status === "end" || client.status === "wait") {
        return Promise.resolve(false)
    }

    return new Promise((resolve) => {
        const onReady = () => {
            client.off("end", onEnd)
            resolve(true)
        }
        const onEnd = () => {
            client.off("ready", onReady)
            resolve(false)
        }
        client.once("ready", onReady)
        client.once("end", onEnd)
    })
}

export async function createRedisConnection(
    address: ServerAddress,
    options: RedisConnectionOptions = {}
): Promise<RedisKeyValueStore> {
    const logger = options.logger ?? createLogger("redis-cache")
    const maxAttempts = options.reconnectAttempts ?? defaultReconnectAttempts

    const client = new Redis({
        host: address.host,
        port: address.port,
        lazyConnect: true,
        maxRetriesPerRequest: maxAttempts,
        retryStrategy: (times: number) => {
            const delay = reconnectDelay(times, maxAttempts)
            if (delay !== null) {
                logger.warn({ attempt: times, delay }, "reconnecting to redis")
            }
            return delay
        }
    })
    client.on("error", (err: Error) => {
        logger.debug({ err }, "redis connection error")
    })

    try {
        await client.connect()
    } catch (err) {
        // the first failed attempt rejects connect() while retryStrategy keeps going
        if (!await settled(client)) {
            client.disconnect()
            logger.error({ err, ...address }, "could not connect to redis")
            throw new ConnectionError(address, { cause: err })
        }
    }

    logger.debug(address, "connected to redis")
    return new RedisKeyValueStore(client, logger, address)
}
