import { InvalidArgumentError, TaskCancelledError } from './errors'
import type { TaskOptions, TaskOutcome, TaskState, Work } from './types'

type CompletionListener<T> = (outcome: TaskOutcome<T>) => void

let taskCounter = 0

/**
 * A unit of deferred work for the {@link WorkerPool}.
 *
 * A task settles exactly once per run. Completion listeners stay attached
 * across runs, so a finished task handed back to the pool (see
 * `EventLoop.asyncEvery`) delivers its next outcome to the same listeners.
 */
export class Task<T = unknown> {
  readonly id: string
  readonly name?: string
  readonly syncKey?: string
  private readonly work: Work<T>
  private readonly fallback?: { value: T }
  private readonly listeners: CompletionListener<T>[] = []
  private settleWaiters: CompletionListener<T>[] = []
  private currentState: TaskState = 'pending'
  private lastOutcome?: TaskOutcome<T>

  constructor(work: Work<T>, options: TaskOptions<T> = {}) {
    if (typeof work !== 'function') {
      throw new InvalidArgumentError('Task work must be a function')
    }
    this.work = work
    this.id = `task-${++taskCounter}`
    this.name = options.name
    this.syncKey = options.syncKey
    if (options.defaultValue !== undefined) {
      this.fallback = { value: options.defaultValue }
    }
  }

  get state(): TaskState {
    return this.currentState
  }

  /** True when a fallback result is configured. */
  get hasDefault(): boolean {
    return this.fallback !== undefined
  }

  /** True when the last outcome carries the fallback instead of a computed result. */
  get usedDefault(): boolean {
    return this.lastOutcome?.usedDefault ?? false
  }

  get result(): T | undefined {
    return this.lastOutcome?.result
  }

  get error(): unknown {
    return this.lastOutcome && !this.lastOutcome.ok ? this.lastOutcome.error : undefined
  }

  get outcome(): TaskOutcome<T> | undefined {
    return this.lastOutcome
  }

  isFinished(): boolean {
    return (
      this.currentState === 'succeeded' ||
      this.currentState === 'failed' ||
      this.currentState === 'cancelled'
    )
  }

  isCancelled(): boolean {
    return this.currentState === 'cancelled'
  }

  isRunning(): boolean {
    return this.currentState === 'running'
  }

  onComplete(listener: CompletionListener<T>): this {
    this.listeners.push(listener)
    return this
  }

  /** Resolves with the outcome of the current run (immediately if already finished). */
  whenSettled(): Promise<TaskOutcome<T>> {
    const outcome = this.lastOutcome
    if (outcome && this.isFinished()) {
      return Promise.resolve(outcome)
    }
    return new Promise(resolve => {
      this.settleWaiters.push(resolve)
    })
  }

  /**
   * Cancel a task that has not started yet. Running work is never interrupted.
   *
   * With a default value the task settles successfully with that value;
   * otherwise it settles as failed with a {@link TaskCancelledError}.
   */
  cancel(): boolean {
    if (this.currentState !== 'pending' && this.currentState !== 'queued') {
      return false
    }
    const outcome: TaskOutcome<T> = this.fallback
      ? { ok: true, result: this.fallback.value, usedDefault: true }
      : { ok: false, error: new TaskCancelledError(this.id), result: undefined, usedDefault: false }
    this.settle('cancelled', outcome)
    return true
  }

  /** Return a finished task to `pending` so it can be submitted again. */
  reset(): void {
    if (!this.isFinished()) {
      throw new InvalidArgumentError(`Task '${this.id}' is ${this.currentState} and cannot be reset`)
    }
    this.currentState = 'pending'
    this.lastOutcome = undefined
  }

  /** @internal */
  markQueued(): void {
    if (this.currentState !== 'pending') {
      throw new InvalidArgumentError(`Task '${this.id}' is already ${this.currentState}`)
    }
    this.currentState = 'queued'
  }

  /**
   * @internal
   * Mark the task running and start the work body on a later microtask, so
   * whoever submitted it never runs the body itself. Resolves after listeners
   * have seen the outcome.
   */
  execute(): Promise<TaskOutcome<T>> {
    this.currentState = 'running'
    return Promise.resolve()
      .then<T>(() => this.work())
      .then(
        (result): TaskOutcome<T> => ({ ok: true, result, usedDefault: false }),
        (error: unknown): TaskOutcome<T> =>
          this.fallback
            ? { ok: false, error, result: this.fallback.value, usedDefault: true }
            : { ok: false, error, result: undefined, usedDefault: false }
      )
      .then(outcome => {
        this.settle(outcome.ok ? 'succeeded' : 'failed', outcome)
        return outcome
      })
  }

  private settle(state: TaskState, outcome: TaskOutcome<T>): void {
    this.currentState = state
    this.lastOutcome = outcome
    const waiters = this.settleWaiters
    this.settleWaiters = []
    for (const resolve of waiters) {
      resolve(outcome)
    }
    for (const listener of this.listeners) {
      listener(outcome)
    }
  }
}
