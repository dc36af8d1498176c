import { KeyValueStore } from "../../src/ports/key-value-store"

export function iterator(num: number) {
    return Array.from(Array(num).keys())
}

export async function flushPromises() {
    return new Promise((res) => {
        setImmediate(res)
    })
}

export class FakeClock {
    constructor(public nowMs = 0) {}

    now = () => this.nowMs

    advance(ms: number) {
        this.nowMs += ms
    }
}

interface Entry {
    value: Buffer
    expiresAt: number | null
}

function globToRegExp(pattern: string): RegExp {
    let source = ""
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i]
        if (char === "\\" && i + 1 < pattern.length) {
            i++
            source += pattern[i].replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
        } else if (char === "*") {
            source += ".*"
        } else if (char === "?") {
            source += "."
        } else {
            source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
        }
    }
    return new RegExp(`^${source}$`, "s")
}

/**
 * In-process stand-in for a Redis server, with expiry driven by a clock the
 * test controls.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
    private readonly entries = new Map<string, Entry>()
    public failWrites = false
    public closed = false
    public ended = false

    constructor(private readonly clock: FakeClock = new FakeClock()) {}

    isOpen(): boolean {
        return !this.ended
    }

    raw(key: string): Buffer | null {
        return this.live(key)?.value ?? null
    }

    async get(key: string): Promise<Buffer | null> {
        return this.raw(key)
    }

    async set(key: string, value: Buffer, expiryMs?: number): Promise<boolean> {
        if (this.failWrites) {
            throw new Error("READONLY You can't write against a read only replica.")
        }
        if (expiryMs !== undefined && expiryMs <= 0) {
            throw new Error("ERR invalid expire time in 'set' command")
        }

        this.entries.set(key, {
            value: Buffer.from(value),
            expiresAt: expiryMs === undefined ? null : this.clock.now() + expiryMs
        })
        return true
    }

    setNoReply(key: string, value: Buffer, expiryMs?: number): void {
        this.set(key, value, expiryMs).catch(() => false)
    }

    async del(keys: string[]): Promise<number> {
        return keys.filter((key) => this.live(key) !== undefined && this.entries.delete(key)).length
    }

    async keys(pattern: string): Promise<string[]> {
        const matcher = globToRegExp(pattern)
        return [...this.entries.keys()].filter((key) => this.live(key) !== undefined && matcher.test(key))
    }

    async pttl(key: string): Promise<number> {
        const entry = this.live(key)
        if (entry === undefined) {
            return -2
        }
        return entry.expiresAt === null ? -1 : entry.expiresAt - this.clock.now()
    }

    async flushall(): Promise<void> {
        this.entries.clear()
    }

    async close(): Promise<void> {
        this.closed = true
    }

    private live(key: string): Entry | undefined {
        const entry = this.entries.get(key)
        if (entry?.expiresAt != null && entry.expiresAt <= this.clock.now()) {
            this.entries.delete(key)
            return undefined
        }
        return entry
    }
}
