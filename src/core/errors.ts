import { ServerAddress } from "./types"

export class ConnectionError extends Error {
    constructor(public readonly address: ServerAddress, options?: { cause?: unknown }) {
        super(`Cannot connect to server ${address.host}:${address.port}`, options)
        this.name = "ConnectionError"
    }
}

export class CodecError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "CodecError"
    }
}
