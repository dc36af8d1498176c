import { z } from "zod"
import { ServerAddress } from "../core/types"

export const serverEnvVar = "REDIS_CACHE_SERVER"
export const defaultServer = "127.0.0.1:6379"

export const ServerAddressSchema = z
    .string()
    .regex(/^[^:]+:\d+$/, "expected host:port")
    .transform((value): ServerAddress => {
        const separator = value.lastIndexOf(":")
        return {
            host: value.slice(0, separator),
            port: Number(value.slice(separator + 1))
        }
    })
    .refine((address) => address.port > 0 && address.port < 65536, "port out of range")

export function serverInfo(env: NodeJS.ProcessEnv = process.env): string {
    return env[serverEnvVar] || defaultServer
}

export function resolveServerAddress(env: NodeJS.ProcessEnv = process.env): ServerAddress {
    return ServerAddressSchema.parse(serverInfo(env))
}
