/**
 * Tests for the WebSocket transport
 */

import { describe, it, expect, vi } from 'vitest'
import { WebSocketTransport, rawDataToString } from '../../src/sync/websocket'
import { ConnectionError } from '../../src/client/errors'
import { createNoopLogger } from '../../src/logging'
import { createSocketRecorder } from '../helpers/mock-socket'

function setup(url: string | (() => string) = 'ws://localhost:8090/api/pubsub') {
  const recorder = createSocketRecorder()
  const transport = new WebSocketTransport({ url, createSocket: recorder.createSocket, logger: createNoopLogger() })
  const sink = { onFrame: vi.fn(), onClose: vi.fn() }
  transport.open(sink)
  return { recorder, transport, sink, socket: recorder.last() }
}

describe('rawDataToString', () => {
  it('should decode a buffer', () => {
    expect(rawDataToString(Buffer.from('hello'))).toBe('hello')
  })

  it('should join fragmented buffers', () => {
    expect(rawDataToString([Buffer.from('hel'), Buffer.from('lo')])).toBe('hello')
  })

  it('should decode an ArrayBuffer', () => {
    const bytes = new TextEncoder().encode('hello')
    const buffer = new ArrayBuffer(bytes.length)
    new Uint8Array(buffer).set(bytes)
    expect(rawDataToString(buffer)).toBe('hello')
  })
})

describe('WebSocketTransport', () => {
  it('should resolve the URL when opened', () => {
    const url = vi.fn(() => 'ws://localhost:8090/api/pubsub?token=test-token')
    const { socket } = setup(url)

    expect(url).toHaveBeenCalledTimes(1)
    expect(socket.url).toBe('ws://localhost:8090/api/pubsub?token=test-token')
  })

  it('should forward text frames', () => {
    const { socket, sink } = setup()
    socket.simulateOpen()

    socket.simulateRawMessage('{"type":"ready","clientId":"c1"}')

    expect(sink.onFrame).toHaveBeenCalledWith('{"type":"ready","clientId":"c1"}')
  })

  it('should ignore binary frames', () => {
    const { socket, sink } = setup()
    socket.simulateOpen()

    socket.emit('message', Buffer.from([1, 2, 3]), true)

    expect(sink.onFrame).not.toHaveBeenCalled()
  })

  it('should send once open', () => {
    const { socket, transport } = setup()
    socket.simulateOpen()

    transport.send('{"type":"ping","requestId":"r1"}')

    expect(socket.sent).toEqual(['{"type":"ping","requestId":"r1"}'])
  })

  it('should refuse to send before the socket opens', () => {
    const { transport } = setup()
    expect(() => transport.send('x')).toThrow('Unable to send message - socket is not open.')
  })

  it('should report a close with code and reason', () => {
    const { socket, sink } = setup()
    socket.simulateOpen()

    socket.simulateClose(1011, 'server error')

    expect(sink.onClose).toHaveBeenCalledTimes(1)
    const error = sink.onClose.mock.calls[0][0]
    expect(error).toBeInstanceOf(ConnectionError)
    expect(error).toMatchObject({ message: 'WebSocket closed', closeCode: 1011, reason: 'server error' })
  })

  it('should include the last socket error and hide the token', () => {
    const { socket, sink } = setup('ws://localhost:8090/api/pubsub?token=test-token')

    socket.simulateError('ECONNREFUSED')
    socket.simulateClose()

    const error = sink.onClose.mock.calls[0][0]
    expect(error.message).toBe('WebSocket closed: ECONNREFUSED')
    expect(error.url).toBe('ws://localhost:8090/api/pubsub?token=%5BREDACTED%5D')
    expect(error.cause).toBeInstanceOf(Error)
  })

  it('should report a socket that cannot be created', () => {
    const transport = new WebSocketTransport({
      url: 'ws://localhost:8090/api/pubsub',
      createSocket: () => {
        throw new SyntaxError('Invalid URL')
      },
      logger: createNoopLogger(),
    })
    const sink = { onFrame: vi.fn(), onClose: vi.fn() }

    transport.open(sink)

    expect(sink.onClose).toHaveBeenCalledWith(expect.any(ConnectionError))
    expect(sink.onClose.mock.calls[0][0].message).toBe('Failed to create WebSocket')
  })

  it('should close with a normal closure and stay silent afterwards', () => {
    const { socket, transport, sink } = setup()
    socket.simulateOpen()

    transport.close()
    transport.close()
    socket.simulateRawMessage('late')
    socket.simulateClose(1000)

    expect(socket.closeCalls).toEqual([{ code: 1000, reason: 'client disconnect' }])
    expect(sink.onFrame).not.toHaveBeenCalled()
    expect(sink.onClose).not.toHaveBeenCalled()
    expect(() => transport.send('x')).toThrow(ConnectionError)
  })
})
