export * from "./core/types"
export * from "./core/errors"
export * from "./core/cache-key"
export * from "./core/value-codec"
export * from "./core/shared-connection"
export * from "./core/namespaced-cache"
export * from "./ports/key-value-store"
export * from "./adapters/redis-key-value-store"
export * from "./config"
export * from "./factory/cache-factory"
export { createLogger } from "./logger"
