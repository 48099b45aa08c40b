import { InvalidArgumentError } from './errors'
import type { LoopCallback } from './types'

/** What a timer needs from the loop that owns it. */
export interface TimerHost {
  now(): number
  addTimer(timer: Timer): void
  cancelTimer(timer: Timer): void
  hasTimer(timer: Timer): boolean
}

export type TimerOptions = {
  periodMs?: number
  singleShot?: boolean
}

/**
 * Single-shot or periodic action owned by one loop.
 *
 * A timer is running iff it is in its loop's timer set. The loop fires it on
 * the first step where `now - lastFireTime >= periodMs`; firing records the
 * step's `now`, not the ideal deadline, so a late step does not cause a
 * catch-up burst.
 *
 * @example
 * ```typescript
 * const timer = loop.every(100, () => poll())
 * // later
 * timer.cancel()
 * ```
 */
export class Timer<R = unknown> {
  periodMs: number | undefined
  singleShot: boolean
  private readonly host: TimerHost
  private readonly callback: LoopCallback<R>
  private lastFire: number
  private lastResult: R | undefined

  constructor(host: TimerHost, callback: LoopCallback<R>, options: TimerOptions = {}) {
    this.host = host
    this.callback = callback
    this.periodMs = options.periodMs
    this.singleShot = options.singleShot ?? false
    this.lastFire = host.now()
  }

  get lastFireTime(): number {
    return this.lastFire
  }

  /** Return value of the most recent fire. */
  get result(): R | undefined {
    return this.lastResult
  }

  /** Insert into the loop's timer set, optionally replacing the period. */
  start(periodMs: number | undefined = this.periodMs): this {
    if (periodMs === undefined) {
      throw new InvalidArgumentError('Timer has no period')
    }
    if (!Number.isFinite(periodMs) || periodMs < 0) {
      throw new InvalidArgumentError(`Timer period must be a non-negative number, got ${periodMs}`)
    }
    this.periodMs = periodMs
    this.host.addTimer(this)
    return this
  }

  cancel(): void {
    this.host.cancelTimer(this)
  }

  isRunning(): boolean {
    return this.host.hasTimer(this)
  }

  isDue(now: number = this.host.now()): boolean {
    if (this.periodMs === undefined) return false
    return now - this.lastFire >= this.periodMs
  }

  fire(now: number = this.host.now()): R {
    this.lastFire = now
    this.lastResult = this.callback()
    return this.lastResult
  }

  reset(now: number = this.host.now()): void {
    this.lastFire = now
  }
}
