import { CacheFacade, Key, Namespace } from "./types"
import { SharedConnection } from "./shared-connection"
import { cacheKey, keysPattern, namespacePrefix } from "./cache-key"
import { decode, encode } from "./value-codec"

export class NamespacedCache implements CacheFacade {
    constructor(private readonly connection: SharedConnection) { }

    public async get<V = unknown>(namespace: Namespace, key: Key): Promise<V | null> {
        const store = await this.connection.acquire()
        const raw = await store.get(cacheKey(namespace, key))
        if (raw === null) {
            return null
        }

        // the stored type is whatever the writer put under this key
        return decode(raw) as V
    }

    /**
     * Stores `value` under the namespaced key. `exptime` is in seconds and
     * may be fractional; it is truncated to whole milliseconds. With
     * `fireAndForget` the write is not awaited and a failure on the
     * store side cannot be observed.
     */
    public async set(
        namespace: Namespace,
        key: Key,
        value: unknown,
        exptime?: number,
        fireAndForget = false
    ): Promise<boolean> {
        const store = await this.connection.acquire()
        const expiryMs = exptime === undefined ? undefined : Math.trunc(exptime * 1000)
        const storeKey = cacheKey(namespace, key)
        const bytes = encode(value)

        if (fireAndForget) {
            store.setNoReply(storeKey, bytes, expiryMs)
            return true
        }
        return await store.set(storeKey, bytes, expiryMs)
    }

    public async setNoWait(namespace: Namespace, key: Key, value: unknown, exptime?: number): Promise<void> {
        await this.set(namespace, key, value, exptime, true)
    }

    public async del(namespace: Namespace, ...keys: Key[]): Promise<number> {
        if (keys.length === 0) {
            return 0
        }

        const store = await this.connection.acquire()
        return await store.del(keys.map((key) => cacheKey(namespace, key)))
    }

    public async keys(namespace: Namespace): Promise<string[]> {
        const store = await this.connection.acquire()
        const prefix = namespacePrefix(namespace)
        const found = await store.keys(keysPattern(namespace))

        return found.map((key) => key.slice(prefix.length))
    }

    /**
     * Whole seconds left before the key expires, rounded down so it never
     * overstates. Missing keys and keys without an expiry report 0.
     */
    public async ttl(namespace: Namespace, key: Key): Promise<number> {
        const store = await this.connection.acquire()
        const ms = await store.pttl(cacheKey(namespace, key))

        return ms <= 0 ? 0 : Math.trunc(ms / 1000)
    }

    public async flushall(): Promise<void> {
        const store = await this.connection.acquire()
        await store.flushall()
    }

    public async close(): Promise<void> {
        await this.connection.reset()
    }
}
