import pino from 'pino'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Logger used by the CLI. Writes to stderr so that stdout only carries the
 * command's own output.
 */
export function createLogger(level: LogLevel = 'info'): pino.Logger {
  return pino({ name: 'creation-order', level }, pino.destination(2))
}
