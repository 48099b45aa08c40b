import { describe, expect, it } from 'vitest'
import { DEFAULT_PERIOD_MS, resolveEventLoopConfig } from '../../src/config'
import { InvalidArgumentError } from '../../src/errors'

describe('resolveEventLoopConfig', () => {
  it('falls back to defaults', () => {
    const config = resolveEventLoopConfig({}, {})

    expect(config.periodMs).toBe(DEFAULT_PERIOD_MS)
    expect(config.maxConcurrency).toBeGreaterThanOrEqual(1)
    expect(config.maxQueueDepth).toBe(Number.POSITIVE_INFINITY)
    expect(config.queuePolicy).toBe('reject')
    expect(config.logLevel).toBe('info')
  })

  it('reads the environment', () => {
    const config = resolveEventLoopConfig(
      {},
      {
        TICKLOOP_PERIOD_MS: '20',
        TICKLOOP_POOL_SIZE: '3',
        TICKLOOP_QUEUE_DEPTH: '100',
        TICKLOOP_LOG_LEVEL: 'DEBUG',
      }
    )

    expect(config).toEqual({
      periodMs: 20,
      maxConcurrency: 3,
      maxQueueDepth: 100,
      queuePolicy: 'reject',
      logLevel: 'debug',
    })
  })

  it('prefers explicit options over the environment', () => {
    const config = resolveEventLoopConfig(
      { periodMs: 5, maxConcurrency: 2, logLevel: 'warn' },
      { TICKLOOP_PERIOD_MS: '20', TICKLOOP_POOL_SIZE: '3', TICKLOOP_LOG_LEVEL: 'debug' }
    )

    expect(config.periodMs).toBe(5)
    expect(config.maxConcurrency).toBe(2)
    expect(config.logLevel).toBe('warn')
  })

  it('ignores blank variables', () => {
    expect(resolveEventLoopConfig({}, { TICKLOOP_PERIOD_MS: '  ' }).periodMs).toBe(DEFAULT_PERIOD_MS)
  })

  it('rejects malformed values', () => {
    expect(() => resolveEventLoopConfig({}, { TICKLOOP_PERIOD_MS: 'soon' })).toThrow(InvalidArgumentError)
    expect(() => resolveEventLoopConfig({}, { TICKLOOP_POOL_SIZE: '0' })).toThrow(InvalidArgumentError)
    expect(() => resolveEventLoopConfig({}, { TICKLOOP_LOG_LEVEL: 'loud' })).toThrow(InvalidArgumentError)
    expect(() => resolveEventLoopConfig({ periodMs: -1 }, {})).toThrow(InvalidArgumentError)
    expect(() => resolveEventLoopConfig({ maxQueueDepth: -5 }, {})).toThrow(InvalidArgumentError)
  })
})
