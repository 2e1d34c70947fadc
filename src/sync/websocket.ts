/**
 * WebSocket Transport
 *
 * Text-frame transport for the message-bus channel, built on the `ws`
 * package. The socket constructor is injectable so tests can drive the
 * lifecycle by hand.
 */

import WebSocket from 'ws'
import { ConnectionError } from '../client/errors'
import { createDefaultLogger, type Logger } from '../logging'
import type { Transport, TransportSink } from './transport'

// ============================================================================
// Socket Abstraction
// ============================================================================

/**
 * The part of a `ws` socket the transport relies on.
 */
export interface SocketLike {
  readonly readyState: number
  on(event: 'open', listener: () => void): unknown
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
  send(data: string): void
  close(code?: number, reason?: string): void
}

export type SocketFactory = (url: string) => SocketLike

export const createSocket: SocketFactory = (url) => new WebSocket(url)

/** Normal closure, sent when the client disconnects on purpose */
const NORMAL_CLOSURE = 1000

/**
 * Converts a `ws` payload to text.
 */
export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.from(data).toString('utf8')
}

// ============================================================================
// WebSocketTransport
// ============================================================================

export interface WebSocketTransportOptions {
  /** Resolved at `open()`, so a refreshed token is picked up on reconnect */
  url: string | (() => string)
  createSocket?: SocketFactory
  logger?: Logger
}

export class WebSocketTransport implements Transport<string> {
  private socket: SocketLike | null = null
  private closed = false
  private readonly options: WebSocketTransportOptions
  private readonly logger: Logger

  constructor(options: WebSocketTransportOptions) {
    this.options = options
    this.logger = options.logger ?? createDefaultLogger()
  }

  open(sink: TransportSink<string>): void {
    const url = typeof this.options.url === 'function' ? this.options.url() : this.options.url
    const factory = this.options.createSocket ?? createSocket

    let socket: SocketLike
    try {
      socket = factory(url)
    } catch (error) {
      sink.onClose(new ConnectionError('Failed to create WebSocket', { cause: error, url: redactToken(url) }))
      return
    }
    this.socket = socket

    let lastError: Error | undefined

    socket.on('open', () => {
      if (this.closed) return
      this.logger.debug('WebSocket opened')
    })

    socket.on('message', (data, isBinary) => {
      if (this.closed) return
      if (isBinary) {
        this.logger.debug('Ignoring binary frame')
        return
      }
      sink.onFrame(rawDataToString(data))
    })

    socket.on('error', (error) => {
      if (this.closed) return
      lastError = error
      this.logger.debug('WebSocket error', { error })
    })

    socket.on('close', (code, reason) => {
      if (this.closed) return
      this.closed = true
      this.socket = null
      const reasonText = reason.toString('utf8')
      sink.onClose(
        new ConnectionError(lastError ? `WebSocket closed: ${lastError.message}` : 'WebSocket closed', {
          cause: lastError,
          closeCode: code,
          reason: reasonText,
          url: redactToken(url),
        })
      )
    })
  }

  send(text: string): void {
    if (this.closed || !this.socket || this.socket.readyState !== WebSocket.OPEN) {
      throw new ConnectionError('Unable to send message - socket is not open.')
    }
    this.socket.send(text)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    const socket = this.socket
    this.socket = null
    if (socket) {
      try {
        socket.close(NORMAL_CLOSURE, 'client disconnect')
      } catch (error) {
        this.logger.debug('Error while closing WebSocket', { error })
      }
    }
  }
}

/**
 * Strips the `token` query parameter before a URL lands in an error.
 */
function redactToken(url: string): string {
  try {
    const parsed = new URL(url)
    if (parsed.searchParams.has('token')) {
      parsed.searchParams.set('token', '[REDACTED]')
    }
    return parsed.toString()
  } catch {
    return url
  }
}
