/**
 * Connection Manager
 *
 * Owns the lifecycle of one logical realtime channel: lazy connect,
 * handshake detection, waiter release, drop handling and backoff
 * reconnection. It is generic over the frame type so the message-bus and
 * record-change bindings share it; the binding supplies the transport
 * factory and interprets frames, calling `markReady()` once it sees the
 * handshake.
 *
 * @example
 * ```typescript
 * const connection = new ConnectionManager<string>({
 *   createTransport: () => new WebSocketTransport({ url }),
 *   onFrame: (frame) => handle(frame),
 *   shouldReconnect: () => registry.hasActiveTopics(),
 * })
 * await connection.ensureConnected()
 * connection.send(text)
 * ```
 */

import { ConnectionError, HandshakeTimeoutError, wrapError, ErrorCode } from '../client/errors'
import { createDefaultLogger, type Logger } from '../logging'
import type { PendingRequestCorrelator } from './correlator'
import { ReconnectionManager, type ReconnectionConfig } from './reconnect'
import type { Transport, TransportFactory } from './transport'

// ============================================================================
// Types
// ============================================================================

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Ready = 'ready',
}

export interface ReadyInfo {
  clientId: string
  /** True when an earlier connection of the same session had been ready */
  reconnected: boolean
}

export type StateChangeListener = (state: ConnectionState, previous: ConnectionState) => void

export interface ConnectionManagerOptions<TFrame> {
  createTransport: TransportFactory<TFrame>
  /** Every frame of the current transport, including the handshake */
  onFrame: (frame: TFrame) => void
  /** Called after each successful handshake */
  onReady?: (info: ReadyInfo) => void
  /** Consulted after a drop: reconnect only while this returns true */
  shouldReconnect: () => boolean
  /** Called once the reconnect attempts are exhausted */
  onGiveUp?: (error: Error) => void
  /** Pending requests failed whenever the connection goes away */
  correlator?: PendingRequestCorrelator
  reconnect?: ReconnectionConfig
  /** Time allowed between opening the transport and the handshake, in ms */
  handshakeTimeout?: number
  logger?: Logger
}

interface ConnectWaiter {
  resolve: () => void
  reject: (error: Error) => void
}

export const DEFAULT_HANDSHAKE_TIMEOUT = 15_000

// ============================================================================
// ConnectionManager
// ============================================================================

export class ConnectionManager<TFrame> {
  private _state: ConnectionState = ConnectionState.Disconnected
  private _clientId: string | null = null
  private transport: Transport<TFrame> | null = null
  private waiters: ConnectWaiter[] = []
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null
  private manualClose = false
  /** Whether a handshake succeeded since the session started */
  private hasBeenReady = false
  private readonly stateListeners = new Set<StateChangeListener>()
  private readonly reconnection: ReconnectionManager
  private readonly handshakeTimeout: number
  private readonly logger: Logger
  private readonly options: ConnectionManagerOptions<TFrame>

  constructor(options: ConnectionManagerOptions<TFrame>) {
    this.options = options
    this.reconnection = new ReconnectionManager(options.reconnect)
    this.handshakeTimeout = options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT
    this.logger = options.logger ?? createDefaultLogger()
  }

  get state(): ConnectionState {
    return this._state
  }

  get isReady(): boolean {
    return this._state === ConnectionState.Ready
  }

  /** Server-assigned id of the current connection, null unless ready */
  get clientId(): string | null {
    return this._clientId
  }

  /** Reconnect attempts made since the last handshake or the start of the session */
  get attempt(): number {
    return this.reconnection.attempt
  }

  /**
   * Resolves once the channel is ready. Concurrent callers share the same
   * connection attempt; none is started while one is already pending.
   */
  ensureConnected(): Promise<void> {
    if (this._state === ConnectionState.Ready) {
      return Promise.resolve()
    }

    this.manualClose = false
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject })
      if (this._state === ConnectionState.Disconnected && !this.reconnection.isScheduled()) {
        this.open()
      }
    })
  }

  /**
   * Records the handshake: the connection becomes ready, waiters are
   * released and `onReady` runs.
   */
  markReady(clientId: string): void {
    if (this._state !== ConnectionState.Connecting) {
      this.logger.debug('Ignoring handshake outside of connecting state', { state: this._state })
      return
    }

    this.clearHandshakeTimer()
    const reconnected = this.hasBeenReady
    this.hasBeenReady = true
    this.reconnection.reset()
    this._clientId = clientId
    this.setState(ConnectionState.Ready)
    this.logger.info(reconnected ? 'Reconnected' : 'Connected', { clientId })

    const waiters = this.takeWaiters()
    for (const waiter of waiters) {
      waiter.resolve()
    }

    this.options.onReady?.({ clientId, reconnected })
  }

  /**
   * Writes one frame to the ready transport.
   *
   * @throws ConnectionError when the channel is not ready
   */
  send(text: string): void {
    if (this._state !== ConnectionState.Ready || !this.transport) {
      throw new ConnectionError('Unable to send message - connection is not ready.')
    }
    this.transport.send(text)
  }

  /**
   * Closes the channel without reconnecting. Pending requests and connect
   * waiters fail with a `ConnectionError`. Calling it again does nothing.
   */
  disconnect(): void {
    this.manualClose = true
    this.endSession()
    this.clearHandshakeTimer()

    const transport = this.transport
    this.transport = null
    this._clientId = null
    transport?.close()

    const error = new ConnectionError('connection closed')
    this.options.correlator?.rejectAll(error)
    this.rejectWaiters(error)

    if (this._state !== ConnectionState.Disconnected) {
      this.logger.info('Disconnected')
      this.setState(ConnectionState.Disconnected)
    }
  }

  /**
   * Registers a state listener. Returns a function that removes it.
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.stateListeners.add(listener)
    return () => {
      this.stateListeners.delete(listener)
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private open(): void {
    this.setState(ConnectionState.Connecting)

    let transport: Transport<TFrame>
    try {
      transport = this.options.createTransport()
    } catch (error) {
      this.transport = null
      this.handleDrop(null, wrapError(error, ErrorCode.CONNECTION, 'Failed to create transport'))
      return
    }
    this.transport = transport

    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null
      this.handleDrop(
        transport,
        new HandshakeTimeoutError('Timed out waiting for handshake.', { timeout: this.handshakeTimeout })
      )
    }, this.handshakeTimeout)

    this.logger.debug('Opening transport', { attempt: this.reconnection.attempt })
    transport.open({
      onFrame: (frame) => {
        if (this.transport !== transport) return
        this.options.onFrame(frame)
      },
      onClose: (error) => {
        this.handleDrop(transport, error ?? new ConnectionError('connection closed'))
      },
    })
  }

  /**
   * Runs when the current transport closes, fails or misses its handshake.
   * Stale transports are ignored.
   */
  private handleDrop(transport: Transport<TFrame> | null, error: Error): void {
    if (transport !== null && transport !== this.transport) {
      return
    }

    this.clearHandshakeTimer()
    this.transport = null
    this._clientId = null
    transport?.close()
    this.setState(ConnectionState.Disconnected)

    this.options.correlator?.rejectAll(new ConnectionError('connection closed', { cause: error }))

    if (this.manualClose || !this.options.shouldReconnect()) {
      this.logger.debug('Connection closed', { error })
      this.endSession()
      this.rejectWaiters(error)
      return
    }

    const delay = this.reconnection.schedule(() => this.open())
    if (delay === null) {
      this.logger.error('Giving up after reconnect attempts were exhausted', {
        attempts: this.reconnection.attempt,
        error,
      })
      this.endSession()
      this.rejectWaiters(error)
      this.options.onGiveUp?.(error)
      return
    }

    this.logger.warn('Connection lost, reconnecting', {
      attempt: this.reconnection.attempt,
      delay,
      error,
    })
  }

  /**
   * Forgets the attempt counter and the ready history, so the next
   * `ensureConnected()` starts a fresh session with a full retry budget.
   */
  private endSession(): void {
    this.reconnection.reset()
    this.hasBeenReady = false
  }

  private setState(state: ConnectionState): void {
    const previous = this._state
    if (previous === state) return
    this._state = state
    for (const listener of Array.from(this.stateListeners)) {
      try {
        listener(state, previous)
      } catch (error) {
        this.logger.error('State listener threw', { error })
      }
    }
  }

  private takeWaiters(): ConnectWaiter[] {
    const waiters = this.waiters
    this.waiters = []
    return waiters
  }

  private rejectWaiters(error: Error): void {
    for (const waiter of this.takeWaiters()) {
      waiter.reject(error)
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer !== null) {
      clearTimeout(this.handshakeTimer)
      this.handshakeTimer = null
    }
  }
}
