/**
 * PubSubClient - message-bus binding of the realtime engine
 *
 * Publishes to and subscribes on named topics over one lazily opened
 * WebSocket (`/api/pubsub`). Commands are correlated with their
 * acknowledgements by request id; subscriptions are reference counted and
 * replayed after a reconnect.
 *
 * @example
 * ```typescript
 * const pubsub = new PubSubClient({ baseUrl: 'https://example.com' })
 * const unsubscribe = await pubsub.subscribe('chat', (message) => {
 *   console.log(message.data)
 * })
 * await pubsub.publish('chat', { text: 'hello' })
 * await unsubscribe()
 * ```
 *
 * @module client/PubSubClient
 */

import {
  ServerError,
  ValidationError,
  isConnectionError,
  wrapError,
  ErrorCode,
} from './errors'
import type { AuthStore } from './auth'
import { buildURL } from './http'
import { DEFAULT_PUBSUB_MAX_RECONNECT_ATTEMPTS } from '../config'
import { createDefaultLogger, type Logger } from '../logging'
import { ConnectionManager, ConnectionState, type ReadyInfo } from '../sync/connection'
import { PendingRequestCorrelator, createRequestId } from '../sync/correlator'
import { decodeEnvelope, encodeCommand, envelopeToPayload, type Command, type Envelope } from '../sync/envelope'
import { PUBSUB_RECONNECT_INTERVALS } from '../sync/reconnect'
import { SubscriptionRegistry, type Listener } from '../sync/registry'
import { WebSocketTransport, type SocketFactory } from '../sync/websocket'

// ============================================================================
// Types
// ============================================================================

/**
 * A message delivered on a subscribed topic.
 */
export interface PubSubMessage {
  id: string
  topic: string
  created: string
  data: unknown
}

/**
 * Acknowledgement of a published message.
 */
export interface PublishAck {
  id: string
  topic: string
  created: string
}

export type PubSubListener = Listener<PubSubMessage>

/** Removes the listener it was returned for */
export type Unsubscribe = () => Promise<void>

export interface PubSubClientOptions {
  baseUrl: string
  /** Its token is appended as `?token=` whenever the socket is opened */
  authStore?: AuthStore
  createSocket?: SocketFactory
  /** @default 10000 */
  ackTimeout?: number
  /** @default 15000 */
  handshakeTimeout?: number
  /** @default 10 */
  maxReconnectAttempts?: number
  reconnectIntervals?: readonly number[]
  logger?: Logger
  /** Called with the dropped topics once reconnecting is given up */
  onDisconnect?: (topics: string[]) => void
  /** Receives subscribe/unsubscribe failures, which have no caller to reject */
  onError?: (error: Error) => void
}

const PUBSUB_PATH = '/api/pubsub'

/**
 * WebSocket URL of the message-bus endpoint.
 */
export function buildPubSubURL(baseUrl: string, token?: string): string {
  const url = new URL(buildURL(baseUrl, PUBSUB_PATH))
  if (url.protocol === 'https:') {
    url.protocol = 'wss:'
  } else if (url.protocol === 'http:') {
    url.protocol = 'ws:'
  }
  if (token) {
    url.searchParams.set('token', token)
  }
  return url.toString()
}

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key]
  return typeof value === 'string' ? value : ''
}

// ============================================================================
// PubSubClient
// ============================================================================

export class PubSubClient {
  private readonly registry: SubscriptionRegistry<PubSubMessage>
  private readonly correlator: PendingRequestCorrelator
  private readonly connection: ConnectionManager<string>
  private readonly logger: Logger
  private readonly options: PubSubClientOptions
  /** Set by `disconnect()` while listeners remain */
  private replayOnConnect = false
  /** Topics already subscribed on the current connection */
  private readonly subscribed = new Set<string>()

  constructor(options: PubSubClientOptions) {
    this.options = options
    this.logger = (options.logger ?? createDefaultLogger()).withContext({ component: 'pubsub' })
    this.registry = new SubscriptionRegistry({ logger: this.logger })
    this.correlator = new PendingRequestCorrelator({ timeout: options.ackTimeout })
    this.connection = new ConnectionManager<string>({
      createTransport: () =>
        new WebSocketTransport({
          url: () => buildPubSubURL(options.baseUrl, options.authStore?.token),
          createSocket: options.createSocket,
          logger: this.logger,
        }),
      onFrame: (frame) => this.handleFrame(frame),
      onReady: (info) => this.handleReady(info),
      shouldReconnect: () => this.registry.hasActiveTopics(),
      onGiveUp: () => this.handleGiveUp(),
      correlator: this.correlator,
      reconnect: {
        intervals: options.reconnectIntervals ?? PUBSUB_RECONNECT_INTERVALS,
        maxAttempts: options.maxReconnectAttempts ?? DEFAULT_PUBSUB_MAX_RECONNECT_ATTEMPTS,
      },
      handshakeTimeout: options.handshakeTimeout,
      logger: this.logger,
    })
    this.connection.onStateChange((state) => {
      if (state === ConnectionState.Disconnected) {
        this.subscribed.clear()
      }
    })
  }

  get isConnected(): boolean {
    return this.connection.isReady
  }

  get connectionState(): ConnectionState {
    return this.connection.state
  }

  /** Id assigned by the server on the last handshake */
  get clientId(): string | null {
    return this.connection.clientId
  }

  /** Topics that currently have at least one listener */
  get topics(): string[] {
    return this.registry.activeTopics()
  }

  /**
   * Registers a connection state listener.
   */
  onStateChange(listener: (state: ConnectionState) => void): () => void {
    return this.connection.onStateChange((state) => listener(state))
  }

  /**
   * Publishes `data` on `topic` and resolves with the server's ack.
   *
   * @throws ValidationError when `topic` is empty
   * @throws AckTimeoutError when no ack arrives in time
   * @throws ServerError when the server answers with an error frame
   */
  async publish(topic: string, data?: unknown): Promise<PublishAck> {
    assertTopic(topic)
    await this.connection.ensureConnected()

    const requestId = createRequestId()
    const ack = this.correlator.register(requestId, {
      map: (payload): PublishAck => ({
        id: readString(payload, 'id'),
        topic: readString(payload, 'topic') || topic,
        created: readString(payload, 'created'),
      }),
    })
    this.sendCommand({ type: 'publish', topic, data, requestId }, requestId)
    return ack
  }

  /**
   * Adds `listener` to `topic`. The first listener of a topic opens the
   * connection if needed and sends `subscribe`, unless the connection's
   * replay already did; its ack is awaited in the background.
   *
   * @returns a function removing this listener
   * @throws ValidationError when `topic` is empty
   */
  async subscribe(topic: string, listener: PubSubListener): Promise<Unsubscribe> {
    assertTopic(topic)
    const { listenerId, needsSubscribe } = this.registry.addListener(topic, listener)

    try {
      await this.connection.ensureConnected()
    } catch (error) {
      this.registry.removeListener(topic, listenerId)
      if (!this.registry.hasActiveTopics()) {
        this.connection.disconnect()
      }
      throw error
    }

    if (needsSubscribe) {
      this.sendSubscribe(topic)
    }

    let removed = false
    return async () => {
      if (removed) return
      removed = true
      this.removeListener(topic, listenerId)
    }
  }

  /**
   * Drops `topic` with all its listeners, or every topic when called
   * without one. Closes the connection when nothing is left.
   */
  async unsubscribe(topic?: string): Promise<void> {
    const { removed, hasActiveTopics } = this.registry.removeTopic(topic)
    if (removed.length === 0) {
      return
    }

    if (this.connection.isReady) {
      if (topic === undefined) {
        this.sendUnsubscribe()
      } else {
        this.sendUnsubscribe(topic)
      }
    }
    for (const key of removed) {
      this.subscribed.delete(key)
    }

    if (!hasActiveTopics) {
      this.connection.disconnect()
    }
  }

  /**
   * Measures the round trip of a ping.
   *
   * @returns elapsed milliseconds
   */
  async ping(): Promise<number> {
    await this.connection.ensureConnected()
    const requestId = createRequestId()
    const started = Date.now()
    const pong = this.correlator.register(requestId)
    this.sendCommand({ type: 'ping', requestId }, requestId)
    await pong
    return Date.now() - started
  }

  /**
   * Closes the connection. Pending requests fail with a `ConnectionError`;
   * listeners stay registered and are replayed by the next connection.
   */
  disconnect(): void {
    this.replayOnConnect = this.registry.hasActiveTopics()
    this.connection.disconnect()
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  private removeListener(topic: string, listenerId: string): void {
    const hadTopic = this.registry.has(topic)
    this.registry.removeListener(topic, listenerId)
    if (!hadTopic || this.registry.has(topic)) {
      return
    }

    if (this.connection.isReady) {
      this.sendUnsubscribe(topic)
    }
    this.subscribed.delete(topic)
    if (!this.registry.hasActiveTopics()) {
      this.connection.disconnect()
    }
  }

  private sendSubscribe(topic: string): void {
    if (this.subscribed.has(topic)) {
      return
    }
    this.subscribed.add(topic)
    const requestId = createRequestId()
    this.trackAck(requestId, 'subscribe', topic)
    this.sendCommand({ type: 'subscribe', topic, requestId }, requestId)
  }

  private sendUnsubscribe(topic?: string): void {
    if (topic === undefined) {
      this.sendCommand({ type: 'unsubscribe' })
      return
    }
    const requestId = createRequestId()
    this.trackAck(requestId, 'unsubscribe', topic)
    this.sendCommand({ type: 'unsubscribe', topic, requestId }, requestId)
  }

  /**
   * Awaits an ack nobody else waits for and reports its failure.
   */
  private trackAck(requestId: string, operation: string, topic: string): void {
    this.correlator.register(requestId).then(
      () => {
        this.logger.debug(`${operation} acknowledged`, { topic })
      },
      (error: unknown) => {
        const failure = wrapError(error)
        if (isConnectionError(failure)) {
          // the next connection replays active topics
          this.logger.debug(`${operation} interrupted by connection loss`, { topic })
          return
        }
        this.logger.warn(`${operation} failed`, { topic, error: failure })
        this.options.onError?.(failure)
      }
    )
  }

  /**
   * Writes `command`; a write failure rejects the waiter of `requestId`.
   */
  private sendCommand(command: Command, requestId?: string): void {
    try {
      this.connection.send(encodeCommand(command))
    } catch (error) {
      const failure = wrapError(error, ErrorCode.CONNECTION)
      if (requestId === undefined || !this.correlator.reject(requestId, failure)) {
        this.logger.warn(`Failed to send ${command.type}`, { error: failure })
      }
    }
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  private handleFrame(frame: string): void {
    let envelope: Envelope | null
    try {
      envelope = decodeEnvelope(frame)
    } catch (error) {
      this.logger.warn('Dropping malformed frame', { error })
      return
    }
    if (!envelope) {
      this.logger.debug('Ignoring frame of unknown type')
      return
    }

    switch (envelope.type) {
      case 'ready':
        this.connection.markReady(envelope.clientId ?? envelope.id ?? '')
        break

      case 'message':
        if (!envelope.topic) {
          this.logger.debug('Ignoring message without topic')
          return
        }
        this.registry.fanOut(envelope.topic, {
          id: envelope.id ?? '',
          topic: envelope.topic,
          created: envelope.created ?? '',
          data: envelope.data ?? null,
        })
        break

      case 'error':
        if (envelope.requestId) {
          this.correlator.reject(
            envelope.requestId,
            new ServerError(envelope.message ?? 'pubsub error', { requestId: envelope.requestId })
          )
        } else {
          this.logger.warn('Server error without request id', { message: envelope.message })
        }
        break

      default:
        if (envelope.requestId) {
          this.correlator.resolve(envelope.requestId, envelopeToPayload(envelope))
        }
        break
    }
  }

  private handleReady(info: ReadyInfo): void {
    if (!info.reconnected && !this.replayOnConnect) {
      return
    }
    this.replayOnConnect = false
    for (const topic of this.registry.activeTopics()) {
      this.sendSubscribe(topic)
    }
  }

  private handleGiveUp(): void {
    const { removed } = this.registry.removeTopic()
    this.options.onDisconnect?.(removed)
  }
}

function assertTopic(topic: string): void {
  if (!topic) {
    throw new ValidationError('topic must be set.', { field: 'topic' })
  }
}
