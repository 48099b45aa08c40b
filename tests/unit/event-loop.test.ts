import { describe, expect, it, vi } from 'vitest'
import { InvalidArgumentError } from '../../src/errors'
import { Timer } from '../../src/timer'
import { createTestLoop, stepError } from '../helpers/loop'

class SensorError extends Error {}
class ReadTimeoutError extends SensorError {}

const createClockedLoop = () => {
  let time = 0
  const loop = createTestLoop({ now: () => time })
  return {
    loop,
    setTime: (value: number) => {
      time = value
    },
  }
}

describe('EventLoop', () => {
  describe('once', () => {
    it('runs queued callbacks exactly once, in insertion order', () => {
      const loop = createTestLoop()
      const calls: string[] = []

      loop.once(() => calls.push('a'))
      loop.once(() => calls.push('b'))
      loop.once(() => calls.push('c'))
      loop.step()
      loop.step()

      expect(calls).toEqual(['a', 'b', 'c'])
    })

    it('treats a zero or missing delay as the next step', () => {
      const loop = createTestLoop()
      const calls: string[] = []

      expect(loop.once(0, () => calls.push('zero'))).toBeUndefined()
      expect(loop.once(undefined, () => calls.push('missing'))).toBeUndefined()
      loop.step()

      expect(calls).toEqual(['zero', 'missing'])
      expect(loop.timerCount).toBe(0)
    })

    it('creates a single-shot timer for a positive delay', () => {
      const { loop } = createClockedLoop()
      const calls: number[] = []

      const timer = loop.once(200, () => calls.push(1))
      loop.step(199)
      loop.step(200)
      loop.step(400)

      expect(timer).toBeInstanceOf(Timer)
      expect(timer?.singleShot).toBe(true)
      expect(calls).toEqual([1])
    })

    it('runs callbacks queued during a step on the next step', () => {
      const loop = createTestLoop()
      const calls: string[] = []

      loop.once(() => {
        calls.push('outer')
        loop.once(() => calls.push('inner'))
      })
      loop.step()
      expect(calls).toEqual(['outer'])

      loop.step()
      expect(calls).toEqual(['outer', 'inner'])
    })
  })

  describe('step ordering', () => {
    it('runs events, then due timers, then the step callback', () => {
      const { loop } = createClockedLoop()
      const order: string[] = []

      loop.every(10, () => order.push('timer'))
      loop.everyStep(() => order.push('every-step'))
      loop.once(() => order.push('event'))
      loop.step(10, () => order.push('on-step'))

      expect(order).toEqual(['event', 'every-step', 'timer', 'on-step'])
    })

    it('runs per-step callbacks on every step', () => {
      const loop = createTestLoop()
      let count = 0

      loop.everyStep(() => {
        count += 1
      })
      loop.step()
      loop.step()
      loop.step()

      expect(count).toBe(3)
    })
  })

  describe('reentrancy', () => {
    it('lets a timer cancel itself and another due timer still fires this step', () => {
      const { loop } = createClockedLoop()
      const fired: string[] = []

      const first: Timer = loop.every(10, () => {
        fired.push('first')
        first.cancel()
        second.cancel()
      })
      const second: Timer = loop.every(10, () => fired.push('second'))

      loop.step(10)
      loop.step(20)

      expect(fired).toEqual(['first', 'second'])
      expect(loop.timerCount).toBe(0)
    })

    it('does not fire a timer created during the step it was created in', () => {
      const { loop } = createClockedLoop()
      const fired: string[] = []

      loop.once(() => {
        loop.every(0, () => fired.push('late'))
      })
      loop.step(0)
      expect(fired).toEqual([])

      loop.step(0)
      expect(fired).toEqual(['late'])
    })
  })

  describe('errors', () => {
    it('keeps running a step after a callback throws and raises the error at the end', () => {
      const loop = createTestLoop()
      const failure = new Error('event failed')
      const calls: string[] = []

      loop.once(() => {
        throw failure
      })
      loop.once(() => calls.push('after'))

      expect(stepError(loop)).toBe(failure)
      expect(calls).toEqual(['after'])
      expect(stepError(loop)).toBeUndefined()
    })

    it('raises one queued error per step, in order', () => {
      const loop = createTestLoop()
      const first = new Error('first')
      const second = new Error('second')

      loop.once(() => {
        throw first
      })
      loop.once(() => {
        throw second
      })

      expect(stepError(loop)).toBe(first)
      expect(stepError(loop)).toBe(second)
      expect(stepError(loop)).toBeUndefined()
    })

    it('raises a leftover error before running the next step', () => {
      const loop = createTestLoop()
      const first = new Error('first')
      const second = new Error('second')
      const calls: string[] = []

      loop.once(() => {
        throw first
      })
      loop.once(() => {
        throw second
      })
      stepError(loop)
      loop.once(() => calls.push('queued'))

      expect(stepError(loop)).toBe(second)
      expect(calls).toEqual([])

      loop.step()
      expect(calls).toEqual(['queued'])
    })

    it('routes a rejected promise from a callback to the error path', async () => {
      const loop = createTestLoop()
      const failure = new Error('async failure')

      loop.once(() => Promise.reject(failure))
      loop.step()
      await Promise.resolve()
      await Promise.resolve()

      expect(loop.hasEvents()).toBe(true)
      expect(stepError(loop)).toBe(failure)
    })

    it('notifies matching handlers and still raises the error', () => {
      const loop = createTestLoop()
      const sensorHandler = vi.fn()
      const timeoutHandler = vi.fn()
      const rangeHandler = vi.fn()
      const failure = new ReadTimeoutError('sensor timed out')

      loop.onError(SensorError, sensorHandler)
      loop.onError(ReadTimeoutError, timeoutHandler)
      loop.onError(RangeError, rangeHandler)
      loop.once(() => {
        throw failure
      })

      expect(stepError(loop)).toBe(failure)
      expect(sensorHandler).toHaveBeenCalledWith(failure)
      expect(timeoutHandler).toHaveBeenCalledWith(failure)
      expect(rangeHandler).not.toHaveBeenCalled()
    })

    it('registers one handler for several kinds', () => {
      const loop = createTestLoop()
      const handler = vi.fn()

      loop.onErrors([RangeError, TypeError], handler)
      loop.handleError(new TypeError('bad type'), false)
      loop.handleError(new RangeError('out of range'), false)
      loop.handleError(new Error('plain'), false)

      expect(handler).toHaveBeenCalledTimes(2)
      expect(loop.hasEvents()).toBe(false)
    })

    it('queues the error of a handler that throws', () => {
      const loop = createTestLoop()
      const original = new Error('original')
      const handlerFailure = new Error('handler failed')

      loop.onError(Error, () => {
        throw handlerFailure
      })
      loop.handleError(original)

      expect(stepError(loop)).toBe(handlerFailure)
      expect(stepError(loop)).toBe(original)
    })

    it('discards queued errors on clearErrors', () => {
      const loop = createTestLoop()

      loop.handleError(new Error('ignored'))
      loop.clearErrors()

      expect(loop.hasEvents()).toBe(false)
      expect(stepError(loop)).toBeUndefined()
    })
  })

  describe('add', () => {
    it('starts timers and queues callbacks', () => {
      const { loop } = createClockedLoop()
      const timer = new Timer(loop, () => undefined, { periodMs: 10 })
      const calls: string[] = []

      loop.add(timer)
      loop.add(() => calls.push('added'))
      loop.step(0)

      expect(timer.isRunning()).toBe(true)
      expect(calls).toEqual(['added'])
    })

    it('rejects values it does not know how to add', () => {
      const loop = createTestLoop()
      // Untyped callers can hand the loop anything.
      const addUntyped = (item: unknown): unknown => Reflect.apply(loop.add, loop, [item])

      expect(() => addUntyped({ kind: 'not-a-timer' })).toThrow(InvalidArgumentError)
      expect(() => addUntyped(42)).toThrow(InvalidArgumentError)
    })
  })

  describe('clear', () => {
    it('drops events, per-step events, timers and errors', () => {
      const loop = createTestLoop()
      const calls: string[] = []

      loop.once(() => calls.push('event'))
      loop.everyStep(() => calls.push('every-step'))
      loop.every(0, () => calls.push('timer'))
      loop.once(500, () => calls.push('delayed'))
      loop.handleError(new Error('pending'))

      loop.clear()
      loop.step()

      expect(loop.hasEvents()).toBe(false)
      expect(loop.timerCount).toBe(0)
      expect(calls).toEqual([])
    })
  })

  describe('resetTimers', () => {
    it('postpones every timer to a full period from now', () => {
      const { loop } = createClockedLoop()
      const fired: string[] = []
      loop.every(100, () => fired.push('a'))
      loop.every(200, () => fired.push('b'))

      loop.resetTimers(1000)
      loop.step(1099)
      expect(fired).toEqual([])

      loop.step(1100)
      expect(fired).toEqual(['a'])
    })
  })
})
