import superjson from "superjson"
import { CodecError } from "./errors"

/**
 * Leading byte of every value written by the cache. Values whose first
 * byte is none of these were written by some other client and are read
 * back as plain strings.
 */
export enum FormatTag {
    RAW = 0x00,
    ENCODED = 0x01,
    BYTES = 0x02
}

export const protocolVersion = 2

const nonAscii = /[^\x00-\x7f]/

// only ASCII text is stored raw: a number or boolean is encoded and reads back
// with its type, where a raw "1" would come back as a string
function needsEncoding(value: unknown): boolean {
    return typeof value !== "string" || nonAscii.test(value)
}

export function encode(value: unknown): Buffer {
    if (value instanceof Uint8Array) {
        return Buffer.concat([Buffer.of(FormatTag.BYTES), value])
    }
    if (typeof value === "string" && !needsEncoding(value)) {
        return Buffer.concat([Buffer.of(FormatTag.RAW), Buffer.from(value, "ascii")])
    }

    const body = Buffer.from(superjson.stringify(value), "utf8")
    return Buffer.concat([Buffer.of(FormatTag.ENCODED, protocolVersion), body])
}

export function isEncoded(bytes: Uint8Array): boolean {
    return bytes.length > 0 && bytes[0] === FormatTag.ENCODED
}

export function decode(bytes: Buffer): unknown {
    if (isEncoded(bytes)) {
        return decodeStructured(bytes)
    }

    switch (bytes[0]) {
        case FormatTag.RAW:
            return bytes.subarray(1).toString("ascii")
        case FormatTag.BYTES:
            return Buffer.from(bytes.subarray(1))
        default:
            return bytes.toString("utf8")
    }
}

function decodeStructured(bytes: Buffer): unknown {
    const version = bytes[1]
    if (version !== protocolVersion) {
        throw new CodecError(`Unsupported serialization protocol version ${version}`)
    }

    try {
        return superjson.parse(bytes.subarray(2).toString("utf8"))
    } catch (err) {
        throw new CodecError("Stored value is not a valid serialized envelope", { cause: err })
    }
}
