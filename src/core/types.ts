import { Logger } from "pino"

export interface ServerAddress {
    host: string
    port: number
}

export type Namespace = string | null | undefined
export type Key = string | null | undefined

export interface CacheOptions {
    address?: ServerAddress
    reconnectAttempts?: number
    logger?: Logger
}

export interface CacheFacade {
    get<V = unknown>(namespace: Namespace, key: Key): Promise<V | null>
    set(
        namespace: Namespace,
        key: Key,
        value: unknown,
        exptime?: number,
        fireAndForget?: boolean
    ): Promise<boolean>
    setNoWait(namespace: Namespace, key: Key, value: unknown, exptime?: number): Promise<void>
    del(namespace: Namespace, ...keys: Key[]): Promise<number>
    keys(namespace: Namespace): Promise<string[]>
    ttl(namespace: Namespace, key: Key): Promise<number>
    flushall(): Promise<void>
    close(): Promise<void>
}
