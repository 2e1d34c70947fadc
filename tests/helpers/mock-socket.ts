/**
 * In-process stand-ins for the realtime transports.
 */

import { EventEmitter } from 'node:events'
import type { SocketLike } from '../../src/sync/websocket'
import type { StreamEvent } from '../../src/sync/event-stream'
import type { Transport, TransportSink } from '../../src/sync/transport'

// ============================================================================
// Mock WebSocket Implementation
// ============================================================================

export class MockSocket extends EventEmitter implements SocketLike {
  static CONNECTING = 0
  static OPEN = 1
  static CLOSED = 3

  readonly url: string
  readyState: number = MockSocket.CONNECTING
  readonly sent: string[] = []
  readonly closeCalls: Array<{ code?: number; reason?: string }> = []

  constructor(url: string) {
    super()
    this.url = url
  }

  send(data: string): void {
    if (this.readyState !== MockSocket.OPEN) {
      throw new Error('WebSocket is not open')
    }
    this.sent.push(data)
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason })
    this.readyState = MockSocket.CLOSED
  }

  // Test helpers
  simulateOpen(): void {
    this.readyState = MockSocket.OPEN
    this.emit('open')
  }

  simulateMessage(data: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(data)), false)
  }

  simulateRawMessage(text: string): void {
    this.emit('message', Buffer.from(text), false)
  }

  simulateError(message: string = 'Connection error'): void {
    this.emit('error', new Error(message))
  }

  simulateClose(code: number = 1006, reason: string = ''): void {
    this.readyState = MockSocket.CLOSED
    this.emit('close', code, Buffer.from(reason))
  }

  /** Opens the socket and sends the `ready` handshake */
  handshake(clientId: string = 'c1'): void {
    this.simulateOpen()
    this.simulateMessage({ type: 'ready', clientId })
  }

  /** Sent frames decoded as JSON objects */
  commands(): Array<Record<string, unknown>> {
    return this.sent.map(parseObject)
  }

  lastCommand(): Record<string, unknown> {
    const commands = this.commands()
    const last = commands[commands.length - 1]
    if (!last) {
      throw new Error('No command was sent')
    }
    return last
  }
}

/**
 * Collects every socket a client creates.
 */
export function createSocketRecorder(): {
  sockets: MockSocket[]
  createSocket: (url: string) => MockSocket
  last: () => MockSocket
} {
  const sockets: MockSocket[] = []
  return {
    sockets,
    createSocket: (url) => {
      const socket = new MockSocket(url)
      sockets.push(socket)
      return socket
    },
    last: () => {
      const socket = sockets[sockets.length - 1]
      if (!socket) {
        throw new Error('No socket was created')
      }
      return socket
    },
  }
}

// ============================================================================
// Mock Transport
// ============================================================================

/**
 * Transport whose lifecycle is driven by the test.
 */
export class MockTransport<TFrame> implements Transport<TFrame> {
  sink: TransportSink<TFrame> | null = null
  readonly sent: string[] = []
  closed = false
  failSend = false

  open(sink: TransportSink<TFrame>): void {
    this.sink = sink
  }

  send(text: string): void {
    if (this.failSend) {
      throw new Error('send failed')
    }
    this.sent.push(text)
  }

  close(): void {
    this.closed = true
  }

  emit(frame: TFrame): void {
    this.sink?.onFrame(frame)
  }

  drop(error?: Error): void {
    this.sink?.onClose(error)
  }
}

export function createTransportRecorder<TFrame>(): {
  transports: MockTransport<TFrame>[]
  createTransport: () => MockTransport<TFrame>
  last: () => MockTransport<TFrame>
} {
  const transports: MockTransport<TFrame>[] = []
  return {
    transports,
    createTransport: () => {
      const transport = new MockTransport<TFrame>()
      transports.push(transport)
      return transport
    },
    last: () => {
      const transport = transports[transports.length - 1]
      if (!transport) {
        throw new Error('No transport was created')
      }
      return transport
    },
  }
}

export type StreamTransport = MockTransport<StreamEvent>

// ============================================================================
// Helpers
// ============================================================================

export function parseObject(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text)
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Expected a JSON object, got: ${text}`)
  }
  return { ...value }
}

/**
 * Lets pending promise continuations run.
 */
export async function flushMicrotasks(rounds: number = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve()
  }
}
