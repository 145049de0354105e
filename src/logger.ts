import pino, { type Logger } from 'pino'

// stdout carries the MCP stdio channel, so logs go to stderr
const logger: Logger = pino(
    {
        level: process.env.LOG_LEVEL || 'info',
        base: undefined,
        redact: ['req.headers.authorization', 'req.headers.cookie'],
        timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
)

export { logger }

export function withRequest<T extends Record<string, unknown>>(fields: T): Logger {
    return logger.child(fields)
}
