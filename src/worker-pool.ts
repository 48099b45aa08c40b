/**
 * WorkerPool
 *
 * Motivation:
 * - Run deferred work off the loop's critical path with bounded concurrency.
 * - Serialize work that shares a resource without making callers lock.
 *
 * Design:
 * - FIFO queue drained by a pump while fewer than `maxConcurrency` bodies run.
 * - Dispatch reserves the slot and the sync key at once, but the body starts
 *   on a later microtask: `submit` never runs work inside the caller.
 * - A queued task whose sync key is held is skipped until the key is free;
 *   `sync(key, fn)` competes for the same keys.
 * - `maxQueueDepth` + `queuePolicy` bound admission: `reject` throws, and
 *   `drop-oldest` cancels the oldest queued task.
 * - Emits telemetry at queue/dispatch/complete boundaries.
 *
 * Usage:
 * - Owned by an EventLoop (`loop.pool`), or used directly via `run`/`submit`.
 */

import { getDefaultPoolSize } from './config'
import { PoolShutdownError, QueueFullError, InvalidArgumentError } from './errors'
import { createKeyedMutex, type KeyedMutex, type SyncKey } from './keyed-mutex'
import { createLogger, type Logger } from './logger'
import { Task } from './task'
import type {
  PoolEvent,
  PoolEventType,
  QueuePolicy,
  TaskOptions,
  TaskState,
  TelemetrySink,
  Work,
  WorkerPoolState,
} from './types'

export type WorkerPoolOptions = {
  name?: string
  maxConcurrency?: number
  maxQueueDepth?: number
  queuePolicy?: QueuePolicy
  telemetry?: TelemetrySink
  logger?: Logger
  now?: () => number
}

/** The part of a {@link Task} the pool drives, independent of its result type. */
type PoolTask = {
  readonly id: string
  readonly name?: string
  readonly syncKey?: string
  readonly state: TaskState
  cancel(): boolean
  execute(): Promise<{ ok: boolean; error?: unknown }>
}

type QueueEntry = {
  task: PoolTask
  enqueuedAt: number
}

let poolCounter = 0

export class WorkerPool {
  readonly name: string
  private readonly maxConcurrency: number
  private readonly maxQueueDepth: number
  private readonly queuePolicy: QueuePolicy
  private readonly telemetry?: TelemetrySink
  private readonly logger: Logger
  private readonly now: () => number
  private readonly mutex: KeyedMutex
  private pending: QueueEntry[] = []
  private readonly active = new Set<PoolTask>()
  private idleWaiters: Array<() => void> = []
  private totalDispatched = 0
  private isShutdown = false

  constructor(options: WorkerPoolOptions = {}) {
    this.name = options.name ?? `pool-${++poolCounter}`
    this.maxConcurrency = options.maxConcurrency ?? getDefaultPoolSize()
    this.maxQueueDepth = options.maxQueueDepth ?? Number.POSITIVE_INFINITY
    this.queuePolicy = options.queuePolicy ?? 'reject'
    this.telemetry = options.telemetry
    this.logger = options.logger ?? createLogger('worker-pool')
    this.now = options.now ?? (() => Date.now())
    // A key freed by a task or a `sync` call may unblock a queued task.
    this.mutex = createKeyedMutex(() => this.pump())

    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new InvalidArgumentError(
        `maxConcurrency must be a positive integer, got ${this.maxConcurrency}`
      )
    }
  }

  /**
   * Queue a task. A finished task is reset and runs again with the same
   * completion listeners.
   */
  submit<T>(task: Task<T>): Task<T> {
    if (this.isShutdown) {
      throw new PoolShutdownError(this.name)
    }
    if (task.isFinished()) {
      task.reset()
    }
    if (task.state !== 'pending') {
      throw new InvalidArgumentError(`Task '${task.id}' is already ${task.state}`)
    }
    this.applyOverflowPolicy(task)

    task.markQueued()
    this.pending.push({ task, enqueuedAt: this.now() })
    this.emit('queued', task, { queueDepth: this.backlog() })
    this.pump()
    return task
  }

  /** Create a task for `work` and queue it. */
  run<T>(work: Work<T>, options?: TaskOptions<T>): Task<T> {
    return this.submit(new Task(work, options))
  }

  /**
   * Run `fn` while holding `key`: no task or other `sync` call with the same
   * key runs until `fn` settles.
   */
  sync<R>(key: SyncKey, fn: () => R | PromiseLike<R>): Promise<R> {
    return this.mutex
      .acquire(key)
      .then(() => new Promise<R>(resolve => resolve(fn())))
      .finally(() => this.mutex.release(key))
  }

  /** Cancel a queued task. Returns false if it already started or finished. */
  cancel(task: PoolTask): boolean {
    const index = this.pending.findIndex(entry => entry.task === task)
    if (index === -1) {
      return task.cancel()
    }
    this.pending.splice(index, 1)
    const cancelled = task.cancel()
    if (cancelled) {
      this.emit('canceled', task, { queueDepth: this.backlog() })
    }
    this.checkIdle()
    return cancelled
  }

  /** Cancel every queued task. */
  clear(): void {
    const entries = this.pending
    this.pending = []
    for (const { task } of entries) {
      if (task.cancel()) {
        this.emit('canceled', task, { queueDepth: 0 })
      }
    }
    this.checkIdle()
  }

  /** Tasks queued but not started. */
  backlog(): number {
    return this.pending.reduce((count, entry) => (entry.task.state === 'queued' ? count + 1 : count), 0)
  }

  activeCount(): number {
    return this.active.size
  }

  /** True while any task is queued or running. */
  isProcessing(): boolean {
    return this.active.size > 0 || this.backlog() > 0
  }

  isShutDown(): boolean {
    return this.isShutdown
  }

  /** Resolves once nothing is queued or running. */
  whenIdle(): Promise<void> {
    if (!this.isProcessing()) {
      return Promise.resolve()
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  /** Refuse new tasks and resolve once queued and running work has drained. */
  shutdown(): Promise<void> {
    if (!this.isShutdown) {
      this.isShutdown = true
      this.logger.debug({ pool: this.name, backlog: this.backlog() }, 'Worker pool shutting down')
    }
    return this.whenIdle()
  }

  getState(): WorkerPoolState {
    return {
      name: this.name,
      maxConcurrency: this.maxConcurrency,
      active: this.active.size,
      backlog: this.backlog(),
      heldKeys: this.mutex.heldKeys(),
      maxQueueDepth: this.maxQueueDepth,
      queuePolicy: this.queuePolicy,
      totalDispatched: this.totalDispatched,
      shutdown: this.isShutdown,
    }
  }

  private applyOverflowPolicy(task: PoolTask): void {
    const saturated = this.active.size >= this.maxConcurrency
    if (!saturated || this.backlog() < this.maxQueueDepth) return

    if (this.queuePolicy === 'drop-oldest') {
      const oldest = this.pending.find(entry => entry.task.state === 'queued')
      if (oldest) {
        this.logger.debug({ pool: this.name, taskId: oldest.task.id }, 'Dropping oldest queued task')
        this.cancel(oldest.task)
        return
      }
    }

    const error = new QueueFullError(this.name, this.maxQueueDepth)
    this.emit('rejected', task, { error })
    throw error
  }

  private pump(): void {
    // Scheduler loop: dispatch queued work while capacity is available.
    let index = 0
    while (this.active.size < this.maxConcurrency && index < this.pending.length) {
      const entry = this.pending[index]
      // Tasks cancelled directly (task.cancel()) are pruned here.
      if (entry.task.state !== 'queued') {
        this.pending.splice(index, 1)
        continue
      }
      const key = entry.task.syncKey
      if (key !== undefined && !this.mutex.tryAcquire(key)) {
        index += 1
        continue
      }
      this.pending.splice(index, 1)
      this.dispatch(entry)
    }
    this.checkIdle()
  }

  private dispatch(entry: QueueEntry): void {
    const { task } = entry
    const startedAt = this.now()
    this.active.add(task)
    this.totalDispatched += 1
    this.emit('dispatch', task, { queueWaitMs: startedAt - entry.enqueuedAt })

    void task
      .execute()
      .then(outcome => {
        const durationMs = this.now() - startedAt
        if (outcome.ok) {
          this.emit('success', task, { durationMs })
        } else {
          this.emit('error', task, { durationMs, error: outcome.error })
        }
      })
      .catch((error: unknown) => {
        // The outcome was recorded; a completion listener or the telemetry sink threw.
        this.logger.error(
          { err: error, pool: this.name, taskId: task.id },
          'Task completion handling failed'
        )
      })
      .finally(() => {
        this.active.delete(task)
        if (task.syncKey !== undefined) {
          this.mutex.release(task.syncKey)
        }
        this.pump()
      })
  }

  private checkIdle(): void {
    if (this.idleWaiters.length === 0 || this.isProcessing()) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }

  private emit(type: PoolEventType, task: PoolTask, detail: Partial<PoolEvent> = {}): void {
    if (!this.telemetry) return
    this.telemetry({
      ...detail,
      type,
      poolName: this.name,
      taskId: task.id,
      taskName: task.name,
      syncKey: task.syncKey,
      ts: this.now(),
    })
  }
}
