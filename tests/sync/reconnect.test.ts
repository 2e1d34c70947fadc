/**
 * Tests for the reconnect backoff policy
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  ReconnectionManager,
  backoffDelay,
  PUBSUB_RECONNECT_INTERVALS,
  REALTIME_RECONNECT_INTERVALS,
} from '../../src/sync/reconnect'
import { ValidationError } from '../../src/client/errors'

describe('backoffDelay', () => {
  it('should index the table by attempt', () => {
    expect(PUBSUB_RECONNECT_INTERVALS.map((_, attempt) => backoffDelay(attempt))).toEqual([
      200, 300, 500, 1000, 1200, 1500, 2000,
    ])
  })

  it('should repeat the last entry once the table runs out', () => {
    expect(backoffDelay(7)).toBe(2000)
    expect(backoffDelay(100)).toBe(2000)
  })

  it('should use the realtime table', () => {
    expect(backoffDelay(0, REALTIME_RECONNECT_INTERVALS)).toBe(300)
    expect(backoffDelay(4, REALTIME_RECONNECT_INTERVALS)).toBe(300)
  })

  it('should return 0 for an empty table', () => {
    expect(backoffDelay(3, [])).toBe(0)
  })
})

describe('ReconnectionManager', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('configuration', () => {
    it('should default to the message-bus table and unlimited attempts', () => {
      const manager = new ReconnectionManager()
      expect(manager.getConfig()).toEqual({
        intervals: PUBSUB_RECONNECT_INTERVALS,
        maxAttempts: Infinity,
      })
    })

    it('should reject negative intervals', () => {
      expect(() => new ReconnectionManager({ intervals: [100, -1] })).toThrow(ValidationError)
    })

    it('should reject a descending table', () => {
      expect(() => new ReconnectionManager({ intervals: [300, 200] })).toThrow('reconnect intervals must be ascending')
    })

    it('should reject negative maxAttempts', () => {
      expect(() => new ReconnectionManager({ maxAttempts: -1 })).toThrow(ValidationError)
    })
  })

  describe('schedule', () => {
    it('should run after the delay of the current attempt', () => {
      const manager = new ReconnectionManager()
      const run = vi.fn()

      expect(manager.schedule(run)).toBe(200)
      expect(manager.attempt).toBe(1)

      vi.advanceTimersByTime(199)
      expect(run).not.toHaveBeenCalled()
      vi.advanceTimersByTime(1)
      expect(run).toHaveBeenCalledTimes(1)
    })

    it('should grow the delay with each attempt', () => {
      const manager = new ReconnectionManager()
      const delays: Array<number | null> = []
      for (let i = 0; i < 4; i++) {
        delays.push(manager.schedule(() => {}))
        vi.runAllTimers()
      }
      expect(delays).toEqual([200, 300, 500, 1000])
    })

    it('should keep a pending timer instead of scheduling a second one', () => {
      const manager = new ReconnectionManager()
      const run = vi.fn()

      manager.schedule(run)
      expect(manager.schedule(run)).toBe(200)
      expect(manager.attempt).toBe(1)

      vi.runAllTimers()
      expect(run).toHaveBeenCalledTimes(1)
    })

    it('should refuse once maxAttempts is reached', () => {
      const manager = new ReconnectionManager({ intervals: [300], maxAttempts: 2 })
      expect(manager.schedule(() => {})).toBe(300)
      vi.runAllTimers()
      expect(manager.schedule(() => {})).toBe(300)
      vi.runAllTimers()

      expect(manager.canRetry()).toBe(false)
      expect(manager.schedule(() => {})).toBeNull()
      expect(manager.getStatus()).toEqual({
        state: 'failed',
        attempt: 2,
        scheduledDelay: null,
        remainingAttempts: 0,
      })
    })
  })

  describe('status', () => {
    it('should report a scheduled attempt', () => {
      const manager = new ReconnectionManager({ maxAttempts: 5 })
      manager.schedule(() => {})
      expect(manager.isScheduled()).toBe(true)
      expect(manager.getStatus()).toEqual({
        state: 'scheduled',
        attempt: 1,
        scheduledDelay: 200,
        remainingAttempts: 4,
      })
    })
  })

  describe('cancel and reset', () => {
    it('should cancel the pending attempt but keep the counter', () => {
      const manager = new ReconnectionManager()
      const run = vi.fn()
      manager.schedule(run)
      manager.cancel()

      vi.runAllTimers()
      expect(run).not.toHaveBeenCalled()
      expect(manager.attempt).toBe(1)
      expect(manager.isScheduled()).toBe(false)
    })

    it('should start over from the first delay after reset', () => {
      const manager = new ReconnectionManager()
      manager.schedule(() => {})
      vi.runAllTimers()
      manager.schedule(() => {})
      manager.reset()

      expect(manager.attempt).toBe(0)
      expect(manager.getStatus().state).toBe('idle')
      expect(manager.schedule(() => {})).toBe(200)
    })
  })
})
