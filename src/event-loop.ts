/**
 * EventLoop
 *
 * Motivation:
 * - Run user callbacks, timer actions and deferred-work completions strictly
 *   one after another, so user code never reasons about interleaving.
 *
 * Design:
 * - `step()` snapshots due work (queued events, per-step events, due timers),
 *   clears the one-shot queue, then executes the snapshot. Callbacks may call
 *   back into the loop (`once`, `every`, `cancel`) without touching the
 *   snapshot being executed.
 * - Deferred work runs in the WorkerPool; its completion re-enters the loop
 *   through `once`, so result callbacks and error handlers only ever run
 *   inside a step.
 * - Errors escaping a callback are offered to the registered handlers and
 *   queued; a step raises at most one queued error, before it starts and
 *   after it finishes.
 *
 * Usage:
 * - `loop.once(fn)`, `loop.every(100, fn)`, `loop.async(work, onResult)`
 * - Drive with `await loop.exec()` (until `stop()`), `await loop.steps()`
 *   (until idle), or call `loop.step()` directly.
 */

import { resolveEventLoopConfig, type ConfigEnv, type EventLoopConfigInput } from './config'
import { InvalidArgumentError } from './errors'
import { ErrorHandlerRegistry, type ErrorHandler, type ErrorKind } from './error-handlers'
import type { SyncKey } from './keyed-mutex'
import { createLogger, type Logger } from './logger'
import { Task } from './task'
import { Timer, type TimerHost } from './timer'
import type {
  DeferCallbacks,
  DeferOptions,
  LoopCallback,
  ResultCallback,
  TaskOutcome,
  TelemetrySink,
  Work,
} from './types'
import { WorkerPool } from './worker-pool'

export type EventLoopOptions = EventLoopConfigInput & {
  // Name for logs; also names the pool the loop creates.
  name?: string
  // Use an existing pool instead of creating one.
  pool?: WorkerPool
  // Clock used for timers and step timestamps. Defaults to Date.now().
  now?: () => number
  logger?: Logger
  telemetry?: TelemetrySink
  // Environment consulted for configuration. Defaults to process.env.
  env?: ConfigEnv
}

/** Deferred-work callback: a result function, or the full option set. */
export type DeferCallback<T> = ResultCallback<T> | DeferOptions<T>

export class EventLoop implements TimerHost {
  readonly name: string
  readonly pool: WorkerPool
  /** Default step period for exec/steps/waitFor. */
  readonly periodMs: number
  private readonly clock: () => number
  private readonly logger: Logger
  private pendingEvents: LoopCallback[] = []
  private everyStepEvents: LoopCallback[] = []
  private readonly timers = new Set<Timer>()
  private readonly errorHandlers = new ErrorHandlerRegistry()
  private pendingErrors: unknown[] = []
  private stopped = false

  constructor(options: EventLoopOptions = {}) {
    const config = resolveEventLoopConfig(options, options.env)
    this.name = options.name ?? 'event-loop'
    this.periodMs = config.periodMs
    this.clock = options.now ?? (() => Date.now())
    this.logger = options.logger ?? createLogger(this.name, config.logLevel)
    this.pool =
      options.pool ??
      new WorkerPool({
        name: `${this.name}-pool`,
        maxConcurrency: config.maxConcurrency,
        maxQueueDepth: config.maxQueueDepth,
        queuePolicy: config.queuePolicy,
        telemetry: options.telemetry,
        logger: this.logger.child({ component: 'worker-pool' }),
      })
  }

  now(): number {
    return this.clock()
  }

  /** Run `callback` during the next step. */
  once(callback: LoopCallback): void
  /** Run `callback` once `delayMs` has elapsed; a missing or zero delay means the next step. */
  once(delayMs: number | undefined, callback: LoopCallback): Timer | undefined
  once(
    delayOrCallback: number | undefined | LoopCallback,
    maybeCallback?: LoopCallback
  ): Timer | undefined {
    const callback = typeof delayOrCallback === 'function' ? delayOrCallback : maybeCallback
    const delayMs = typeof delayOrCallback === 'function' ? undefined : delayOrCallback
    if (typeof callback !== 'function') {
      throw new InvalidArgumentError('once requires a callback')
    }
    if (delayMs !== undefined && delayMs > 0) {
      return new Timer(this, callback, { periodMs: delayMs, singleShot: true }).start()
    }
    this.pendingEvents.push(callback)
    return undefined
  }

  /** Run `callback` every `periodMs`. Cancel through the returned timer. */
  every<R>(periodMs: number, callback: LoopCallback<R>): Timer<R> {
    return new Timer(this, callback, { periodMs }).start()
  }

  /** Run `callback` on every step until `clear()`. */
  everyStep(callback: LoopCallback): void {
    this.everyStepEvents.push(callback)
  }

  /**
   * Run `work` in the pool and deliver its outcome on the loop.
   *
   * - `onResult` runs on success, or with the default value when the work
   *   failed and one is configured.
   * - `onSettled` always runs and may return an {@link ErrorDirective} to
   *   ignore or replace the error.
   *
   * An error left in force is passed to `handleError`, and queued for the
   * driver unless the task has a default value. A task cancelled before it
   * ran fails with a {@link TaskCancelledError} like any other error.
   */
  defer<T>(options: DeferOptions<T>, work: Work<T>): Task<T> {
    const { onResult, onSettled, ...taskOptions } = options
    if (onResult && onSettled) {
      throw new InvalidArgumentError('defer accepts onResult or onSettled, not both')
    }
    const callbacks: DeferCallbacks<T> = { onResult, onSettled }
    const task = new Task(work, taskOptions)
    task.onComplete(outcome => {
      if (outcome.ok && !onResult && !onSettled) return
      this.once(() => this.deliver(outcome, callbacks))
    })
    this.pool.submit(task)
    return task
  }

  /** `defer` with the work first. */
  async<T>(work: Work<T>, callback?: DeferCallback<T>): Task<T> {
    const options: DeferOptions<T> =
      typeof callback === 'function' ? { onResult: callback } : (callback ?? {})
    return this.defer(options, work)
  }

  /**
   * Periodically run `work` in the pool with at most one task outstanding:
   * a tick submits the task when there is none, re-submits it once it has
   * finished, and does nothing while it is queued or running.
   */
  asyncEvery<T>(periodMs: number, work: Work<T>, callback?: DeferCallback<T>): Timer<Task<T>> {
    let task: Task<T> | undefined
    return this.every(periodMs, (): Task<T> => {
      if (!task) {
        task = this.async(work, callback)
        return task
      }
      if (task.isFinished()) {
        this.add(task)
      }
      return task
    })
  }

  /**
   * Run `fn` under the pool's exclusion for `key`.
   * Awaiting this inside a step stalls the caller until the key is free.
   */
  sync<R>(key: SyncKey, fn: () => R | PromiseLike<R>): Promise<R> {
    return this.pool.sync(key, fn)
  }

  onError<E>(kind: ErrorKind<E>, handler: ErrorHandler<E>): void {
    this.errorHandlers.register(kind, handler)
  }

  onErrors<E>(kinds: ReadonlyArray<ErrorKind<E>>, handler: ErrorHandler<E>): void {
    for (const kind of kinds) {
      this.errorHandlers.register(kind, handler)
    }
  }

  /**
   * Notify every handler whose kind matches, then queue the error for the
   * driver when `save` is true. A throwing handler has its own error queued.
   */
  handleError(error: unknown, save = true): void {
    for (const handler of this.errorHandlers.matching(error)) {
      try {
        handler(error)
      } catch (handlerError) {
        this.logger.error({ err: handlerError }, 'Error handler failed')
        this.pendingErrors.push(handlerError)
      }
    }
    if (save) {
      this.logger.warn({ err: error }, 'Error queued for the loop driver')
      this.pendingErrors.push(error)
    }
  }

  /**
   * One pass of the loop: events in insertion order, then due timers in
   * registration order, then `onStep`. Throws at most one queued error,
   * either before running anything or after everything ran.
   */
  step(now: number = this.now(), onStep?: LoopCallback): void {
    this.raisePendingError()

    const events = [...this.pendingEvents, ...this.everyStepEvents]
    this.pendingEvents = []
    const dueTimers: Timer[] = []
    for (const timer of this.timers) {
      if (timer.isDue(now)) {
        dueTimers.push(timer)
      }
    }
    for (const timer of dueTimers) {
      if (timer.singleShot) {
        this.timers.delete(timer)
      }
    }

    for (const event of events) {
      this.guard(event)
    }
    for (const timer of dueTimers) {
      this.guard(() => timer.fire(now))
    }
    if (onStep) {
      this.guard(onStep)
    }

    this.raisePendingError()
  }

  /**
   * Step every `periodMs` until `stop()`. Timers are reset first so nothing
   * fires just because the loop started late. Rejects with the first error a
   * step raises.
   */
  async exec(periodMs: number = this.periodMs, onStep?: LoopCallback): Promise<void> {
    this.stopped = false
    this.resetTimers()
    this.logger.debug({ periodMs }, 'Event loop started')
    try {
      while (!this.stopped) {
        const startedAt = this.now()
        this.step(startedAt, onStep)
        if (this.stopped) break
        await sleep(Math.max(0, periodMs - (this.now() - startedAt)))
      }
    } finally {
      this.logger.debug('Event loop stopped')
    }
  }

  /** Stop `exec` after the current step. */
  stop(): void {
    this.stopped = true
  }

  /** Step every `periodMs` while the pool is busy or events/errors are pending. */
  async steps(periodMs: number = this.periodMs, onStep?: LoopCallback): Promise<void> {
    while (this.pool.isProcessing() || this.hasEvents()) {
      const startedAt = this.now()
      this.step(startedAt, onStep)
      await sleep(Math.max(0, periodMs - (this.now() - startedAt)))
    }
  }

  /** `exec` until `predicate` returns true at the end of a step. */
  waitFor(predicate: () => boolean, periodMs: number = this.periodMs): Promise<void> {
    return this.exec(periodMs, () => {
      if (predicate()) {
        this.stop()
      }
    })
  }

  /** True when one-shot events or errors are waiting for a step. */
  hasEvents(): boolean {
    return this.pendingEvents.length > 0 || this.pendingErrors.length > 0
  }

  /**
   * Add a timer (start it), a task (submit it to the pool, re-running it if
   * finished) or a callback (queue it for the next step).
   */
  add<T>(item: Timer | Task<T> | LoopCallback): void {
    if (item instanceof Timer) {
      this.addTimer(item)
    } else if (item instanceof Task) {
      this.pool.submit(item)
    } else if (typeof item === 'function') {
      this.once(item)
    } else {
      throw new InvalidArgumentError(`Do not know how to add ${String(item)} to the event loop`)
    }
  }

  addTimer(timer: Timer): void {
    this.timers.add(timer)
  }

  cancelTimer(timer: Timer): void {
    this.timers.delete(timer)
  }

  hasTimer(timer: Timer): boolean {
    return this.timers.has(timer)
  }

  get timerCount(): number {
    return this.timers.size
  }

  resetTimers(now: number = this.now()): void {
    for (const timer of this.timers) {
      timer.reset(now)
    }
  }

  backlog(): number {
    return this.pool.backlog()
  }

  /** Drop queued events, per-step events, timers and pending errors. */
  clear(): void {
    this.pendingErrors = []
    this.timers.clear()
    this.pendingEvents = []
    this.everyStepEvents = []
  }

  clearErrors(): void {
    this.pendingErrors = []
  }

  /** Stop, clear, and shut the pool down once its work has drained. */
  shutdown(): Promise<void> {
    this.stop()
    this.clear()
    this.logger.debug('Event loop shutting down')
    return this.pool.shutdown()
  }

  // Decides from the outcome alone: a re-submitted task may already be running again.
  private deliver<T>(outcome: TaskOutcome<T>, callbacks: DeferCallbacks<T>): void {
    let failed = !outcome.ok
    let error = outcome.ok ? undefined : outcome.error

    if (callbacks.onSettled) {
      const directive = callbacks.onSettled(outcome)
      if (failed && directive) {
        if (directive.action === 'ignore') {
          failed = false
        } else if (directive.action === 'override') {
          error = directive.error
        }
      }
    } else if (callbacks.onResult) {
      if (outcome.ok) {
        callbacks.onResult(outcome.result)
      } else if (outcome.usedDefault === true) {
        callbacks.onResult(outcome.result)
      }
    }

    if (failed) {
      this.handleError(error, !outcome.usedDefault)
    }
  }

  private guard(callback: LoopCallback): void {
    try {
      const result = callback()
      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch((error: unknown) => this.handleError(error, true))
      }
    } catch (error) {
      this.handleError(error, true)
    }
  }

  private raisePendingError(): void {
    if (this.pendingErrors.length === 0) return
    const error = this.pendingErrors.shift()
    throw error
  }
}

const sleep = (ms: number) =>
  new Promise<void>(resolve => {
    setTimeout(resolve, ms)
  })

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function'
