/**
 * Tests for the connection lifecycle manager
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConnectionManager, ConnectionState, type ConnectionManagerOptions } from '../../src/sync/connection'
import { PendingRequestCorrelator } from '../../src/sync/correlator'
import { ConnectionError, HandshakeTimeoutError } from '../../src/client/errors'
import { createNoopLogger } from '../../src/logging'
import { createTransportRecorder, flushMicrotasks } from '../helpers/mock-socket'

function setup(overrides: Partial<ConnectionManagerOptions<string>> = {}) {
  const recorder = createTransportRecorder<string>()
  const state = { active: true }
  const onFrame = vi.fn()
  const onReady = vi.fn()
  const onGiveUp = vi.fn()
  const correlator = new PendingRequestCorrelator()
  const manager = new ConnectionManager<string>({
    createTransport: recorder.createTransport,
    onFrame,
    onReady,
    onGiveUp,
    shouldReconnect: () => state.active,
    correlator,
    reconnect: { intervals: [200, 300, 500], maxAttempts: 3 },
    logger: createNoopLogger(),
    ...overrides,
  })
  return { manager, recorder, state, onFrame, onReady, onGiveUp, correlator }
}

describe('ConnectionManager', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('ensureConnected', () => {
    it('should open a transport and resolve on markReady', async () => {
      const { manager, recorder, onReady } = setup()

      const connected = manager.ensureConnected()
      expect(manager.state).toBe(ConnectionState.Connecting)
      expect(recorder.transports).toHaveLength(1)

      manager.markReady('c1')
      await connected

      expect(manager.state).toBe(ConnectionState.Ready)
      expect(manager.clientId).toBe('c1')
      expect(onReady).toHaveBeenCalledWith({ clientId: 'c1', reconnected: false })
    })

    it('should share one attempt between concurrent callers', async () => {
      const { manager, recorder } = setup()

      const first = manager.ensureConnected()
      const second = manager.ensureConnected()
      expect(recorder.transports).toHaveLength(1)

      manager.markReady('c1')
      await expect(Promise.all([first, second])).resolves.toEqual([undefined, undefined])
    })

    it('should resolve immediately when ready', async () => {
      const { manager, recorder } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      await manager.ensureConnected()
      expect(recorder.transports).toHaveLength(1)
    })

    it('should forward frames of the current transport', () => {
      const { manager, recorder, onFrame } = setup()
      void manager.ensureConnected()

      recorder.last().emit('hello')
      expect(onFrame).toHaveBeenCalledWith('hello')
    })
  })

  describe('markReady', () => {
    it('should be ignored outside of the connecting state', () => {
      const { manager, onReady } = setup()
      manager.markReady('c1')

      expect(manager.state).toBe(ConnectionState.Disconnected)
      expect(onReady).not.toHaveBeenCalled()
    })
  })

  describe('handshake timeout', () => {
    it('should fail waiters when no reconnect follows', async () => {
      const { manager, recorder, state } = setup({ handshakeTimeout: 1000 })
      state.active = false

      const connected = manager.ensureConnected()
      const assertion = expect(connected).rejects.toBeInstanceOf(HandshakeTimeoutError)
      await vi.advanceTimersByTimeAsync(1000)

      await assertion
      expect(manager.state).toBe(ConnectionState.Disconnected)
      expect(recorder.last().closed).toBe(true)
    })

    it('should retry and keep waiters queued while topics are active', async () => {
      const { manager, recorder } = setup({ handshakeTimeout: 1000 })

      const connected = manager.ensureConnected()
      await vi.advanceTimersByTimeAsync(1000)
      expect(manager.attempt).toBe(1)

      await vi.advanceTimersByTimeAsync(200)
      expect(recorder.transports).toHaveLength(2)

      manager.markReady('c2')
      await connected
      expect(manager.clientId).toBe('c2')
    })

    it('should not report reconnected when no earlier attempt became ready', async () => {
      const { manager, recorder, onReady } = setup()

      const connected = manager.ensureConnected()
      recorder.last().drop(new Error('refused'))
      await vi.advanceTimersByTimeAsync(200)
      expect(recorder.transports).toHaveLength(2)

      manager.markReady('c1')
      await connected
      expect(onReady).toHaveBeenCalledTimes(1)
      expect(onReady).toHaveBeenCalledWith({ clientId: 'c1', reconnected: false })
    })
  })

  describe('drops', () => {
    it('should reject pending requests with a connection error', async () => {
      const { manager, recorder, correlator } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      const pending = correlator.register('r1')
      recorder.last().drop(new Error('reset'))

      await expect(pending).rejects.toThrow(ConnectionError)
      await expect(pending).rejects.toThrow('connection closed')
      expect(correlator.size).toBe(0)
    })

    it('should reconnect after the first backoff delay and report reconnected', async () => {
      const { manager, recorder, onReady } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      recorder.last().drop()
      expect(manager.state).toBe(ConnectionState.Disconnected)
      expect(manager.clientId).toBeNull()

      await vi.advanceTimersByTimeAsync(199)
      expect(recorder.transports).toHaveLength(1)
      await vi.advanceTimersByTimeAsync(1)
      expect(recorder.transports).toHaveLength(2)
      expect(manager.state).toBe(ConnectionState.Connecting)

      manager.markReady('c2')
      expect(onReady).toHaveBeenLastCalledWith({ clientId: 'c2', reconnected: true })
      expect(manager.attempt).toBe(0)
    })

    it('should not reconnect without active topics', async () => {
      const { manager, recorder, state } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      state.active = false
      recorder.last().drop()
      await vi.advanceTimersByTimeAsync(5000)

      expect(recorder.transports).toHaveLength(1)
    })

    it('should ignore callbacks of a stale transport', async () => {
      const { manager, recorder, onFrame } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      const stale = recorder.last()
      stale.drop()
      await vi.advanceTimersByTimeAsync(200)
      manager.markReady('c2')

      stale.emit('late')
      stale.drop()
      expect(onFrame).not.toHaveBeenCalled()
      expect(manager.state).toBe(ConnectionState.Ready)
    })

    it('should give up after maxAttempts and fail the waiters', async () => {
      const { manager, recorder, onGiveUp } = setup()
      const connected = manager.ensureConnected()
      const assertion = expect(connected).rejects.toThrow('refused')

      recorder.last().drop(new Error('refused'))
      await vi.advanceTimersByTimeAsync(200)
      recorder.last().drop(new Error('refused'))
      await vi.advanceTimersByTimeAsync(300)
      recorder.last().drop(new Error('refused'))
      await vi.advanceTimersByTimeAsync(500)
      expect(recorder.transports).toHaveLength(4)
      recorder.last().drop(new Error('refused'))

      await assertion
      expect(onGiveUp).toHaveBeenCalledTimes(1)
      expect(manager.state).toBe(ConnectionState.Disconnected)
    })

    it('should retry again in a session started after giving up', async () => {
      const { manager, recorder, onGiveUp } = setup({ reconnect: { intervals: [100], maxAttempts: 1 } })
      const first = manager.ensureConnected()
      const firstAssertion = expect(first).rejects.toThrow('refused')
      recorder.last().drop(new Error('refused'))
      await vi.advanceTimersByTimeAsync(100)
      recorder.last().drop(new Error('refused'))
      await firstAssertion
      expect(onGiveUp).toHaveBeenCalledTimes(1)
      expect(manager.attempt).toBe(0)

      const second = manager.ensureConnected()
      expect(recorder.transports).toHaveLength(3)
      recorder.last().drop(new Error('refused'))
      expect(manager.attempt).toBe(1)
      await vi.advanceTimersByTimeAsync(100)
      expect(recorder.transports).toHaveLength(4)

      manager.markReady('c2')
      await second
      expect(onGiveUp).toHaveBeenCalledTimes(1)
    })

    it('should report a failing transport factory as a drop', async () => {
      const { manager, state } = setup({
        createTransport: () => {
          throw new Error('no sockets here')
        },
      })
      state.active = false

      await expect(manager.ensureConnected()).rejects.toThrow('Failed to create transport')
    })
  })

  describe('send', () => {
    it('should write to the ready transport', async () => {
      const { manager, recorder } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      manager.send('{"type":"ping"}')
      expect(recorder.last().sent).toEqual(['{"type":"ping"}'])
    })

    it('should throw when not ready', () => {
      const { manager } = setup()
      expect(() => manager.send('x')).toThrow(ConnectionError)
    })
  })

  describe('disconnect', () => {
    it('should close the transport and fail everything pending', async () => {
      const { manager, recorder, correlator } = setup()
      const connected = manager.ensureConnected()
      const assertion = expect(connected).rejects.toThrow('connection closed')
      const pending = expect(correlator.register('r1')).rejects.toBeInstanceOf(ConnectionError)

      manager.disconnect()

      await assertion
      await pending
      expect(recorder.last().closed).toBe(true)
      expect(manager.state).toBe(ConnectionState.Disconnected)
    })

    it('should cancel a scheduled reconnect', async () => {
      const { manager, recorder } = setup()
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      recorder.last().drop()
      manager.disconnect()
      await vi.advanceTimersByTimeAsync(5000)

      expect(recorder.transports).toHaveLength(1)
      expect(manager.attempt).toBe(0)
    })

    it('should be idempotent', async () => {
      const { manager } = setup()
      const states: ConnectionState[] = []
      manager.onStateChange((state) => states.push(state))
      const connected = manager.ensureConnected()
      manager.markReady('c1')
      await connected

      manager.disconnect()
      manager.disconnect()
      await flushMicrotasks()

      expect(states).toEqual([ConnectionState.Connecting, ConnectionState.Ready, ConnectionState.Disconnected])
    })

    it('should connect again on the next ensureConnected', async () => {
      const { manager, recorder, onReady } = setup()
      const first = manager.ensureConnected()
      manager.markReady('c1')
      await first
      manager.disconnect()

      const second = manager.ensureConnected()
      expect(recorder.transports).toHaveLength(2)
      manager.markReady('c2')
      await second
      expect(onReady).toHaveBeenLastCalledWith({ clientId: 'c2', reconnected: false })
    })
  })

  describe('onStateChange', () => {
    it('should stop notifying after unsubscribe', () => {
      const { manager } = setup()
      const listener = vi.fn()
      const off = manager.onStateChange(listener)
      off()

      void manager.ensureConnected()
      expect(listener).not.toHaveBeenCalled()
    })
  })
})
