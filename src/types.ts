/**
 * tickloop - Type Definitions
 */

/** Callback run by the loop: queued events, timer actions, per-step hooks. */
export type LoopCallback<R = unknown> = () => R

/** A unit of deferred work. May return a value or a promise of one. */
export type Work<T> = () => T | PromiseLike<T>

export type TaskState = 'pending' | 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled'

/**
 * Settlement of a task, delivered to completion listeners.
 *
 * When the work failed but the task carries a default value, `result` holds
 * that default and `usedDefault` is true.
 */
export type TaskOutcome<T> =
  | { ok: true; result: T; usedDefault: boolean }
  | { ok: false; error: unknown; result: T; usedDefault: true }
  | { ok: false; error: unknown; result: undefined; usedDefault: false }

export type TaskOptions<T> = {
  // Tasks sharing a sync key never run concurrently.
  syncKey?: string
  // Label for logs and telemetry.
  name?: string
  // Fallback result used when the work fails or never runs.
  defaultValue?: T
}

/**
 * Returned by an `onSettled` callback to decide what happens to a task error.
 * Returning nothing is the same as `{ action: 'keep' }`.
 */
export type ErrorDirective =
  | { action: 'ignore' }
  | { action: 'override'; error: unknown }
  | { action: 'keep' }

export type ResultCallback<T> = (result: T) => void

export type SettledCallback<T> = (outcome: TaskOutcome<T>) => ErrorDirective | void

export type DeferCallbacks<T> = {
  onResult?: ResultCallback<T>
  onSettled?: SettledCallback<T>
}

export type DeferOptions<T> = TaskOptions<T> & DeferCallbacks<T>

export type QueuePolicy = 'reject' | 'drop-oldest'

// Minimal event set to power lightweight observability.
export type PoolEventType = 'queued' | 'dispatch' | 'success' | 'error' | 'canceled' | 'rejected'

export type PoolEvent = {
  type: PoolEventType
  poolName: string
  taskId: string
  taskName?: string
  syncKey?: string
  /** Milliseconds since epoch. */
  ts: number
  /** Duration of the work body, when applicable. */
  durationMs?: number
  /** Time spent queued before dispatch, if any. */
  queueWaitMs?: number
  /** Queued depth after the event, if applicable. */
  queueDepth?: number
  /** Original error object, if any. */
  error?: unknown
}

export type TelemetrySink = (event: PoolEvent) => void

export interface WorkerPoolState {
  name: string
  /** Maximum number of work bodies running at once. */
  maxConcurrency: number
  /** Tasks running right now. */
  active: number
  /** Tasks queued but not started. */
  backlog: number
  /** Sync keys currently held by a task or a `sync` call. */
  heldKeys: string[]
  maxQueueDepth: number
  queuePolicy: QueuePolicy
  /** Total number of tasks dispatched since creation. */
  totalDispatched: number
  shutdown: boolean
}
