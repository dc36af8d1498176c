import { KeyValueStore } from "../ports/key-value-store"

interface Handle<S> {
    pid: number
    store: Promise<S>
    opened: S | null
}

/**
 * Lazily creates one store per process and hands it out on every access.
 *
 * A handle is bound to the pid that created it: when `acquire` runs under
 * another pid the old handle is dropped, without closing it since its
 * socket belongs to the parent, and a new one is created. A store that
 * has given up reconnecting is dropped the same way. Callers racing on
 * first access share the same pending creation. A failed creation is
 * forgotten so the next access tries again.
 */
export class SharedConnection<S extends KeyValueStore = KeyValueStore> {
    private handle: Handle<S> | null = null

    constructor(
        private readonly connect: () => Promise<S>,
        private readonly currentPid: () => number = () => process.pid
    ) {}

    public async acquire(): Promise<S> {
        const pid = this.currentPid()
        if (this.handle === null || this.handle.pid !== pid || this.handle.opened?.isOpen() === false) {
            this.handle = this.open(pid)
        }
        return await this.handle.store
    }

    public async reset(): Promise<void> {
        const handle = this.handle
        this.handle = null
        if (handle === null || handle.pid !== this.currentPid()) {
            return
        }

        const store = await handle.store.catch(() => null)
        await store?.close()
    }

    private open(pid: number): Handle<S> {
        const handle: Handle<S> = {
            pid,
            opened: null,
            store: this.connect().then(
                (store) => {
                    handle.opened = store
                    return store
                },
                (err: unknown) => {
                    if (this.handle === handle) {
                        this.handle = null
                    }
                    throw err
                })
        }
        return handle
    }
}
