export interface KeyValueStore {
    isOpen(): boolean
    get(key: string): Promise<Buffer | null>
    set(key: string, value: Buffer, expiryMs?: number): Promise<boolean>
    setNoReply(key: string, value: Buffer, expiryMs?: number): void
    del(keys: string[]): Promise<number>
    keys(pattern: string): Promise<string[]>
    pttl(key: string): Promise<number>
    flushall(): Promise<void>
    close(): Promise<void>
}
