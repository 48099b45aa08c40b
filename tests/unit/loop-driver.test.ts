import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PoolShutdownError } from '../../src/errors'
import { createTestLoop } from '../helpers/loop'

describe('EventLoop drivers', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('exec', () => {
    it('fires a 100 ms timer about ten times over 1050 ms of 50 ms steps', async () => {
      const loop = createTestLoop()
      let counter = 0
      loop.every(100, () => {
        counter += 1
      })
      loop.once(1050, () => loop.stop())

      const running = loop.exec(50)
      await vi.advanceTimersByTimeAsync(1100)
      await running

      expect(counter).toBeGreaterThanOrEqual(9)
      expect(counter).toBeLessThanOrEqual(11)
    })

    it('resets timers so nothing fires just because exec started late', async () => {
      const loop = createTestLoop()
      let counter = 0
      loop.every(100, () => {
        counter += 1
      })
      vi.advanceTimersByTime(500)

      await loop.exec(50, () => loop.stop())

      expect(counter).toBe(0)
    })

    it('finishes the current step after stop', async () => {
      const loop = createTestLoop()
      const calls: string[] = []
      loop.once(() => loop.stop())
      loop.once(() => calls.push('same step'))

      await loop.exec(50)

      expect(calls).toEqual(['same step'])
    })

    it('rejects with an error raised by a step, after the step ran', async () => {
      const loop = createTestLoop()
      const failure = new Error('step failed')
      const calls: string[] = []
      loop.once(() => {
        throw failure
      })
      loop.once(() => calls.push('after'))

      await expect(loop.exec(50)).rejects.toBe(failure)
      expect(calls).toEqual(['after'])
    })

    it('rejects on a later iteration when a timer fails', async () => {
      const loop = createTestLoop()
      const failure = new Error('timer failed')
      loop.once(120, () => {
        throw failure
      })

      const running = loop.exec(50)
      const outcome = expect(running).rejects.toBe(failure)
      await vi.advanceTimersByTimeAsync(200)
      await outcome
    })
  })

  describe('steps', () => {
    it('returns at once when there is nothing to do', async () => {
      const loop = createTestLoop()
      loop.every(10, () => undefined)

      await loop.steps(10)

      expect(loop.hasEvents()).toBe(false)
    })

    it('steps until deferred work is delivered', async () => {
      const loop = createTestLoop()
      const results: string[] = []
      loop.async(async () => 'calibrated', result => results.push(result))

      const draining = loop.steps(10)
      await vi.advanceTimersByTimeAsync(100)
      await draining

      expect(results).toEqual(['calibrated'])
      expect(loop.pool.isProcessing()).toBe(false)
    })
  })

  describe('waitFor', () => {
    it('steps until the predicate holds', async () => {
      const loop = createTestLoop()
      let count = 0
      loop.every(20, () => {
        count += 1
      })

      const waiting = loop.waitFor(() => count >= 3, 10)
      await vi.advanceTimersByTimeAsync(100)
      await waiting

      expect(count).toBe(3)
    })
  })

  describe('shutdown', () => {
    it('clears the loop and refuses new deferred work', async () => {
      const loop = createTestLoop()
      loop.every(10, () => undefined)
      loop.once(() => undefined)

      await loop.shutdown()

      expect(loop.timerCount).toBe(0)
      expect(loop.hasEvents()).toBe(false)
      expect(() => loop.async(() => 1)).toThrow(PoolShutdownError)
    })
  })
})
