import { availableParallelism } from 'node:os'
import { InvalidArgumentError } from './errors'
import { isLogLevel, type LogLevel } from './logger'
import type { QueuePolicy } from './types'

/**
 * Configuration
 *
 * Explicit options win, then environment variables, then defaults:
 * - TICKLOOP_PERIOD_MS: step period used by exec/steps/waitFor (default 50)
 * - TICKLOOP_POOL_SIZE: concurrent work bodies in the pool (default: CPU count)
 * - TICKLOOP_QUEUE_DEPTH: max queued tasks (default: unbounded)
 * - TICKLOOP_LOG_LEVEL: pino level (default 'info')
 */

export type EventLoopConfigInput = {
  periodMs?: number
  maxConcurrency?: number
  maxQueueDepth?: number
  queuePolicy?: QueuePolicy
  logLevel?: LogLevel
}

export type EventLoopConfig = Required<EventLoopConfigInput>

export type ConfigEnv = Record<string, string | undefined>

export const DEFAULT_PERIOD_MS = 50

export const resolveEventLoopConfig = (
  options: EventLoopConfigInput = {},
  env: ConfigEnv = process.env
): EventLoopConfig => {
  const periodMs = options.periodMs ?? readNumber(env, 'TICKLOOP_PERIOD_MS') ?? DEFAULT_PERIOD_MS
  const maxConcurrency =
    options.maxConcurrency ?? readNumber(env, 'TICKLOOP_POOL_SIZE') ?? getDefaultPoolSize()
  const maxQueueDepth =
    options.maxQueueDepth ?? readNumber(env, 'TICKLOOP_QUEUE_DEPTH') ?? Number.POSITIVE_INFINITY
  const logLevel = options.logLevel ?? readLogLevel(env) ?? 'info'

  if (periodMs < 0) {
    throw new InvalidArgumentError(`periodMs must not be negative, got ${periodMs}`)
  }
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new InvalidArgumentError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`)
  }
  if (!(maxQueueDepth >= 0)) {
    throw new InvalidArgumentError(`maxQueueDepth must not be negative, got ${maxQueueDepth}`)
  }

  return {
    periodMs,
    maxConcurrency,
    maxQueueDepth,
    queuePolicy: options.queuePolicy ?? 'reject',
    logLevel,
  }
}

const readNumber = (env: ConfigEnv, name: string): number | undefined => {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a number, got '${raw}'`)
  }
  return value
}

const readLogLevel = (env: ConfigEnv): LogLevel | undefined => {
  const raw = env.TICKLOOP_LOG_LEVEL
  if (raw === undefined || raw === '') return undefined
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`TICKLOOP_LOG_LEVEL must be a pino level, got '${raw}'`)
  }
  return level
}

export const getDefaultPoolSize = (): number => {
  const count = availableParallelism()
  return count > 0 ? count : 4
}
