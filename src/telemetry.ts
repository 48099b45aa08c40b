import type { PoolEvent, TelemetrySink } from './types'

/**
 * Telemetry store
 *
 * Consumes PoolEvents and aggregates "current state" metrics per pool,
 * with a rolling window of durations/queue waits for p50/p95.
 *
 * Usage:
 * - `const telemetry = createTelemetryStore()`
 * - Pass `telemetry.emit` as the pool's `telemetry` option.
 * - Call `telemetry.getState()` to drive logging or a debug view.
 */

export type PoolTelemetrySnapshot = {
  poolName: string
  /** Tasks queued and not started yet. */
  queued: number
  /** Tasks running right now. */
  inFlight: number
  totalDispatched: number
  success: number
  failure: number
  canceled: number
  /** Submissions refused because the queue was full. */
  rejected: number
  avgMs?: number
  p50Ms?: number
  p95Ms?: number
  lastDurationMs?: number
  avgQueueWaitMs?: number
  p95QueueWaitMs?: number
  lastError?: unknown
}

export type TelemetrySnapshot = {
  pools: Record<string, PoolTelemetrySnapshot>
}

export type TelemetryStore = {
  emit: TelemetrySink
  getState: () => TelemetrySnapshot
  reset: () => void
}

export type TelemetryStoreOptions = {
  maxSamples?: number
}

type PoolTelemetryInternal = Omit<
  PoolTelemetrySnapshot,
  'avgMs' | 'p50Ms' | 'p95Ms' | 'avgQueueWaitMs' | 'p95QueueWaitMs'
> & {
  totalDurationMs: number
  durations: number[]
  queueWaits: number[]
}

export const createTelemetryStore = (options: TelemetryStoreOptions = {}): TelemetryStore => {
  const maxSamples = options.maxSamples ?? 200
  const pools = new Map<string, PoolTelemetryInternal>()

  const ensurePool = (poolName: string): PoolTelemetryInternal => {
    const existing = pools.get(poolName)
    if (existing) return existing
    const created: PoolTelemetryInternal = {
      poolName,
      queued: 0,
      inFlight: 0,
      totalDispatched: 0,
      success: 0,
      failure: 0,
      canceled: 0,
      rejected: 0,
      totalDurationMs: 0,
      durations: [],
      queueWaits: [],
    }
    pools.set(poolName, created)
    return created
  }

  const pushSample = (samples: number[], value: number) => {
    samples.push(value)
    if (samples.length > maxSamples) {
      samples.shift()
    }
  }

  const recordFinish = (metrics: PoolTelemetryInternal, event: PoolEvent) => {
    metrics.inFlight = Math.max(0, metrics.inFlight - 1)
    if (event.durationMs !== undefined) {
      metrics.totalDurationMs += event.durationMs
      metrics.lastDurationMs = event.durationMs
      pushSample(metrics.durations, event.durationMs)
    }
  }

  const emit: TelemetrySink = event => {
    const metrics = ensurePool(event.poolName)

    switch (event.type) {
      case 'queued':
        metrics.queued += 1
        return
      case 'dispatch':
        metrics.totalDispatched += 1
        metrics.inFlight += 1
        metrics.queued = Math.max(0, metrics.queued - 1)
        if (event.queueWaitMs !== undefined) {
          pushSample(metrics.queueWaits, event.queueWaitMs)
        }
        return
      case 'success':
        metrics.success += 1
        recordFinish(metrics, event)
        return
      case 'error':
        metrics.failure += 1
        metrics.lastError = event.error
        recordFinish(metrics, event)
        return
      case 'canceled':
        // Only queued tasks can be cancelled.
        metrics.canceled += 1
        metrics.queued = Math.max(0, metrics.queued - 1)
        return
      case 'rejected':
        metrics.rejected += 1
        return
    }
  }

  const getState = (): TelemetrySnapshot => {
    const snapshot: TelemetrySnapshot = { pools: {} }

    for (const metrics of pools.values()) {
      const { totalDurationMs, durations, queueWaits, ...counters } = metrics
      const count = metrics.success + metrics.failure
      const { p50, p95 } = computeQuantiles(durations)
      snapshot.pools[metrics.poolName] = {
        ...counters,
        avgMs: count > 0 && durations.length > 0 ? totalDurationMs / count : undefined,
        p50Ms: p50,
        p95Ms: p95,
        avgQueueWaitMs:
          queueWaits.length > 0
            ? queueWaits.reduce((sum, value) => sum + value, 0) / queueWaits.length
            : undefined,
        p95QueueWaitMs: computeQuantiles(queueWaits).p95,
      }
    }

    return snapshot
  }

  const reset = () => {
    pools.clear()
  }

  return { emit, getState, reset }
}

const computeQuantiles = (values: number[]): { p50?: number; p95?: number } => {
  if (values.length === 0) return { p50: undefined, p95: undefined }
  const sorted = [...values].sort((a, b) => a - b)
  const p50 = sorted[Math.floor((sorted.length - 1) * 0.5)]
  const p95 = sorted[Math.floor((sorted.length - 1) * 0.95)]
  return { p50, p95 }
}
