import pino, { Logger } from "pino"

const level = process.env.LOG_LEVEL ?? "info"

export function createLogger(name: string): Logger {
    return pino({ name, level })
}
