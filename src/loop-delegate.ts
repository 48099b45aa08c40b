import { DesignatedObjectNotFoundError } from './errors'
import type { EventLoop, DeferCallback } from './event-loop'
import type { SyncKey } from './keyed-mutex'
import type { Task } from './task'
import type { Timer } from './timer'
import type { DeferOptions, TaskOutcome } from './types'

export type LoopDelegateConfig<Target, Args extends unknown[], R> = {
  // Label for errors, usually the delegated method's name.
  method: string
  // Current designated object; undefined while it is not available. An Error
  // returned here is raised in place of DesignatedObjectNotFoundError.
  resolve: () => Target | Error | undefined
  invoke: (target: Target, ...args: Args) => R | PromiseLike<R>
  // Serialize every call through the pool under this key. Omit for thread-safe targets.
  syncKey?: SyncKey
  // Returned by `call` while the target is missing; used as the task default for `async`.
  defaultValue?: R
  // Applied on the loop to every result, the default included, before callbacks see it.
  filter?: (result: R) => R
}

export type LoopDelegate<Args extends unknown[], R> = {
  /** Invoke now, under the sync key when one is configured. */
  call: (...args: Args) => Promise<R>
  /** Invoke in the pool and deliver the outcome on the loop. */
  async: (args: Args, callback?: DeferCallback<R>) => Task<R>
  /** Invoke in the pool every `periodMs`, at most one call outstanding. */
  every: (periodMs: number, args: Args, callback?: DeferCallback<R>) => Timer<Task<R>>
}

/**
 * Bind one method of an object that is not safe to call concurrently to a
 * loop.
 *
 * @example
 * ```typescript
 * const readTemperature = createLoopDelegate(loop, {
 *   method: 'readTemperature',
 *   resolve: () => sensors.get('sensor-1'),
 *   invoke: (sensor, unit: 'C' | 'F') => sensor.readTemperature(unit),
 *   syncKey: 'sensor-1',
 * })
 *
 * readTemperature.async(['C'], celsius => display.show(celsius))
 * readTemperature.every(1000, ['C'], celsius => chart.push(celsius))
 * ```
 */
export const createLoopDelegate = <Target, Args extends unknown[], R>(
  loop: EventLoop,
  config: LoopDelegateConfig<Target, Args, R>
): LoopDelegate<Args, R> => {
  const { method, resolve, invoke, syncKey, defaultValue, filter } = config

  const invokeOnTarget = (args: Args): R | PromiseLike<R> => {
    const target = resolve()
    if (target instanceof Error) {
      throw target
    }
    if (target === undefined) {
      throw new DesignatedObjectNotFoundError(method)
    }
    return invoke(target, ...args)
  }

  const filterOutcome = (outcome: TaskOutcome<R>, apply: (result: R) => R): TaskOutcome<R> => {
    if (outcome.ok) return { ...outcome, result: apply(outcome.result) }
    if (outcome.usedDefault === true) return { ...outcome, result: apply(outcome.result) }
    return outcome
  }

  const withFilter = (options: DeferOptions<R>): DeferOptions<R> => {
    if (!filter) return options
    const { onResult, onSettled } = options
    if (onResult) {
      options.onResult = result => onResult(filter(result))
    }
    if (onSettled) {
      options.onSettled = outcome => onSettled(filterOutcome(outcome, filter))
    }
    return options
  }

  const withDelegateOptions = (callback?: DeferCallback<R>): DeferOptions<R> => {
    const options: DeferOptions<R> = withFilter(
      typeof callback === 'function' ? { onResult: callback } : { ...callback }
    )
    if (syncKey !== undefined) options.syncKey = syncKey
    if (defaultValue !== undefined && options.defaultValue === undefined) {
      options.defaultValue = defaultValue
    }
    options.name ??= method
    return options
  }

  const call = (...args: Args): Promise<R> => {
    const target = resolve()
    let result: Promise<R>
    if ((target === undefined || target instanceof Error) && defaultValue !== undefined) {
      result = Promise.resolve(defaultValue)
    } else if (syncKey === undefined) {
      result = new Promise<R>(done => done(invokeOnTarget(args)))
    } else {
      result = loop.sync(syncKey, () => invokeOnTarget(args))
    }
    return filter ? result.then(filter) : result
  }

  return {
    call,
    async: (args, callback) => loop.defer(withDelegateOptions(callback), () => invokeOnTarget(args)),
    every: (periodMs, args, callback) =>
      loop.asyncEvery(periodMs, () => invokeOnTarget(args), withDelegateOptions(callback)),
  }
}
