import { CacheFacade, CacheOptions } from "../core/types"
import { NamespacedCache } from "../core/namespaced-cache"
import { SharedConnection } from "../core/shared-connection"
import { KeyValueStore } from "../ports/key-value-store"
import { createRedisConnection } from "../adapters/redis-key-value-store"
import { resolveServerAddress } from "../config"

export class CacheFactory {
    public static create(
        options: CacheOptions = {},
        connect?: () => Promise<KeyValueStore>
    ): CacheFacade {
        const open = connect ?? (() => createRedisConnection(
            options.address ?? resolveServerAddress(),
            { reconnectAttempts: options.reconnectAttempts, logger: options.logger }
        ))

        return new NamespacedCache(new SharedConnection(open))
    }
}

let defaultInstance: CacheFacade | null = null

export function defaultCache(): CacheFacade {
    defaultInstance ??= CacheFactory.create()
    return defaultInstance
}

export async function resetDefaultCache(): Promise<void> {
    const instance = defaultInstance
    defaultInstance = null
    await instance?.close()
}
