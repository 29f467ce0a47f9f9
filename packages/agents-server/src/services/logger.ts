import { randomUUID } from 'node:crypto'
import winston from 'winston'

let logger: winston.Logger | null = null

export function getLogger(): winston.Logger {
  if (logger) return logger

  const level = process.env.LOG_LEVEL || 'info'
  const isProd = process.env.NODE_ENV === 'production'

  const baseFormat = isProd
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`
        })
      )

  logger = winston.createLogger({
    level,
    defaultMeta: { service: 'agents-server' },
    transports: [new winston.transports.Console({ format: baseFormat })]
  })

  return logger
}

/** Logger bound to one agent run; every line carries the run's trace id. */
export function getRunLogger(traceId: string, userId?: string): winston.Logger {
  return getLogger().child(userId ? { traceId, userId } : { traceId })
}

export function genCorrelationId(): string {
  return randomUUID()
}
