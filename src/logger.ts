import pino, { type Logger, type LoggerOptions } from 'pino'

export type { Logger }

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value)

/**
 * Create a pino logger for one component of the loop.
 *
 * @example
 * ```typescript
 * const log = createLogger('worker-pool', 'debug')
 * log.debug({ taskId }, 'Task dispatched')
 * ```
 */
export const createLogger = (name: string, level: LogLevel = 'info'): Logger => {
  const options: LoggerOptions = {
    name,
    level,
  }
  return pino(options)
}
