/**
 * RealtimeClient - record-change binding of the realtime engine
 *
 * Listens on a long-lived `text/event-stream` response from
 * `/api/realtime`. The stream's first event (`PB_CONNECT`) carries the
 * client id; the set of topics is then registered with a separate
 * `POST /api/realtime`, which is repeated after every (re)connection and
 * whenever the set changes.
 *
 * @module client/RealtimeClient
 */

import { ValidationError, wrapError } from './errors'
import type { AuthStore } from './auth'
import type { RequestSender } from './http'
import { buildURL, DEFAULT_LANG } from './http'
import type { Unsubscribe } from './PubSubClient'
import { DEFAULT_REALTIME_MAX_RECONNECT_ATTEMPTS } from '../config'
import { createDefaultLogger, type Logger } from '../logging'
import { ConnectionManager, ConnectionState } from '../sync/connection'
import type { StreamEvent } from '../sync/event-stream'
import { REALTIME_RECONNECT_INTERVALS } from '../sync/reconnect'
import { SubscriptionRegistry, type Listener } from '../sync/registry'
import { EventStreamTransport } from '../sync/stream'
import type { TransportFactory } from '../sync/transport'

// ============================================================================
// Types
// ============================================================================

/**
 * Options folded into the topic key and applied by the server to the
 * events of that subscription.
 */
export interface RealtimeSubscriptionOptions {
  query?: Record<string, unknown>
  headers?: Record<string, string>
}

export interface RealtimeMessage {
  /** Topic key the event was addressed to */
  topic: string
  payload: Record<string, unknown>
  /** `payload.action` when it is a string */
  action?: string
}

export type RealtimeListener = Listener<RealtimeMessage>

export interface RealtimeClientOptions {
  baseUrl: string
  /** Posts the subscription set */
  http: RequestSender
  authStore?: AuthStore
  /** @default 'en-US' */
  lang?: string
  fetch?: typeof fetch
  /** Replaces the event-stream transport, e.g. in tests */
  createTransport?: TransportFactory<StreamEvent>
  /** @default 15000 */
  handshakeTimeout?: number
  /** @default 5 */
  maxReconnectAttempts?: number
  reconnectIntervals?: readonly number[]
  logger?: Logger
  /** Called with the dropped topics once reconnecting is given up */
  onDisconnect?: (topics: string[]) => void
  /** Receives failed subscription submissions */
  onError?: (error: Error) => void
}

interface Submission {
  clientId: string
  signature: string
  controller: AbortController
  promise: Promise<void>
}

export const REALTIME_PATH = '/api/realtime'

/** Event name of the stream handshake; its `id` is the client id */
export const CONNECT_EVENT = 'PB_CONNECT'

// ============================================================================
// Topic Keys
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON with object keys sorted at every level, so equal options always
 * produce the same text.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (isRecord(value) && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key])
    }
    return sorted
  }
  return value
}

/**
 * Percent-encodes everything except ASCII letters and digits.
 */
function encodeStrict(text: string): string {
  return encodeURIComponent(text).replace(
    /[!'()*\-._~]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  )
}

/**
 * Builds the registry key of `topic` under `options`:
 * `topic?options=<encoded JSON {query, headers}>`. Null and undefined query
 * values are dropped; without any remaining option the key is the topic.
 */
export function makeSubscriptionKey(topic: string, options?: RealtimeSubscriptionOptions): string {
  if (!options) {
    return topic
  }

  const query: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(options.query ?? {})) {
    if (value !== null && value !== undefined) {
      query[key] = value
    }
  }
  const headers = options.headers ?? {}

  const payload: Record<string, unknown> = {}
  if (Object.keys(query).length > 0) payload.query = query
  if (Object.keys(headers).length > 0) payload.headers = headers
  if (Object.keys(payload).length === 0) {
    return topic
  }

  const separator = topic.includes('?') ? '&' : '?'
  return `${topic}${separator}options=${encodeStrict(stableStringify(payload))}`
}

// ============================================================================
// RealtimeClient
// ============================================================================

export class RealtimeClient {
  private readonly registry: SubscriptionRegistry<RealtimeMessage>
  private readonly connection: ConnectionManager<StreamEvent>
  private readonly logger: Logger
  private readonly options: RealtimeClientOptions
  private submission: Submission | null = null

  constructor(options: RealtimeClientOptions) {
    this.options = options
    this.logger = (options.logger ?? createDefaultLogger()).withContext({ component: 'realtime' })
    this.registry = new SubscriptionRegistry({ logger: this.logger })
    this.connection = new ConnectionManager<StreamEvent>({
      createTransport: options.createTransport ?? (() => this.createStreamTransport()),
      onFrame: (event) => this.handleEvent(event),
      onReady: () => {
        void this.submitSubscriptions()
      },
      shouldReconnect: () => this.registry.hasActiveTopics(),
      onGiveUp: () => this.handleGiveUp(),
      reconnect: {
        intervals: options.reconnectIntervals ?? REALTIME_RECONNECT_INTERVALS,
        maxAttempts: options.maxReconnectAttempts ?? DEFAULT_REALTIME_MAX_RECONNECT_ATTEMPTS,
      },
      handshakeTimeout: options.handshakeTimeout,
      logger: this.logger,
    })
    this.connection.onStateChange((state) => {
      if (state === ConnectionState.Disconnected) {
        this.cancelSubmission()
      }
    })
  }

  get isConnected(): boolean {
    return this.connection.isReady
  }

  get connectionState(): ConnectionState {
    return this.connection.state
  }

  /** Client id from the last `PB_CONNECT`, null while not connected */
  get clientId(): string | null {
    return this.connection.clientId
  }

  /** Topic keys that currently have at least one listener */
  get topics(): string[] {
    return this.registry.activeTopics()
  }

  /**
   * Adds `listener` for `topic` (optionally narrowed by `options`), opening
   * the stream when needed and registering the topic with the server.
   *
   * @returns a function removing this listener
   * @throws ValidationError when `topic` is empty
   */
  async subscribe(
    topic: string,
    listener: RealtimeListener,
    options?: RealtimeSubscriptionOptions
  ): Promise<Unsubscribe> {
    if (!topic) {
      throw new ValidationError('topic must be set.', { field: 'topic' })
    }

    const key = makeSubscriptionKey(topic, options)
    const { listenerId } = this.registry.addListener(key, listener)

    try {
      await this.connection.ensureConnected()
    } catch (error) {
      this.registry.removeListener(key, listenerId)
      if (!this.registry.hasActiveTopics()) {
        this.disconnect()
      }
      throw error
    }

    await this.submitSubscriptions()

    let removed = false
    return async () => {
      if (removed) return
      removed = true
      this.registry.removeListener(key, listenerId)
      await this.afterRemoval(this.registry.hasActiveTopics())
    }
  }

  /**
   * Drops `topic` and all its option variants, or every topic when called
   * without one.
   */
  async unsubscribe(topic?: string): Promise<void> {
    const result = topic === undefined ? this.registry.removeTopic() : this.registry.removeTopicVariants(topic)
    await this.afterRemoval(result.hasActiveTopics)
  }

  /**
   * Drops every topic key starting with `prefix`.
   */
  async unsubscribeByPrefix(prefix: string): Promise<void> {
    const result = this.registry.removeByPrefix(prefix)
    await this.afterRemoval(result.hasActiveTopics)
  }

  /**
   * Closes the stream. Listeners stay registered and are submitted again by
   * the next connection.
   */
  disconnect(): void {
    this.connection.disconnect()
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private createStreamTransport(): EventStreamTransport {
    return new EventStreamTransport({
      request: () => {
        const headers: Record<string, string> = {
          Accept: 'text/event-stream',
          'Accept-Language': this.options.lang ?? DEFAULT_LANG,
        }
        const token = this.options.authStore?.token
        if (token) {
          headers['Authorization'] = token
        }
        return { url: buildURL(this.options.baseUrl, REALTIME_PATH), headers }
      },
      fetch: this.options.fetch,
      logger: this.logger,
    })
  }

  private async afterRemoval(hasActiveTopics: boolean): Promise<void> {
    if (hasActiveTopics) {
      await this.submitSubscriptions()
    } else {
      this.disconnect()
    }
  }

  /**
   * Posts the active topics for the current client id. An identical
   * submission already in flight is shared; a different one replaces it.
   * Failures go to `onError` and never reject.
   */
  private submitSubscriptions(): Promise<void> {
    const clientId = this.connection.clientId
    if (!this.connection.isReady || clientId === null) {
      return Promise.resolve()
    }

    const subscriptions = this.registry.activeTopics()
    const signature = stableStringify([...subscriptions].sort())
    const current = this.submission
    if (current && current.clientId === clientId && current.signature === signature) {
      return current.promise
    }
    this.cancelSubmission()

    const controller = new AbortController()
    const promise = this.options.http
      .send(REALTIME_PATH, {
        method: 'POST',
        body: { clientId, subscriptions },
        signal: controller.signal,
      })
      .then(
        () => {
          this.logger.debug('Subscriptions submitted', { count: subscriptions.length })
        },
        (error: unknown) => {
          if (this.submission?.controller === controller) {
            this.submission = null
          }
          if (controller.signal.aborted) {
            return
          }
          const failure = wrapError(error)
          this.logger.warn('Failed to submit subscriptions', { error: failure })
          this.options.onError?.(failure)
        }
      )

    this.submission = { clientId, signature, controller, promise }
    return promise
  }

  private cancelSubmission(): void {
    const submission = this.submission
    this.submission = null
    submission?.controller.abort()
  }

  private handleEvent(event: StreamEvent): void {
    if (event.event === CONNECT_EVENT) {
      this.connection.markReady(event.id ?? '')
      return
    }

    if (event.data === undefined) {
      return
    }

    let payload: unknown
    try {
      payload = JSON.parse(event.data)
    } catch (error) {
      this.logger.debug('Dropping event with unparsable data', { event: event.event, error })
      return
    }
    if (!isRecord(payload)) {
      this.logger.debug('Dropping event whose data is not an object', { event: event.event })
      return
    }

    const message: RealtimeMessage = { topic: event.event, payload }
    if (typeof payload.action === 'string') {
      message.action = payload.action
    }
    this.registry.fanOut(event.event, message)
  }

  private handleGiveUp(): void {
    const { removed } = this.registry.removeTopic()
    this.options.onDisconnect?.(removed)
  }
}
