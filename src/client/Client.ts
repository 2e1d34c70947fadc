/**
 * Client - entry point tying the realtime channels together
 *
 * Owns the auth store and HTTP primitive and exposes the message-bus
 * (`pubsub`) and record-change (`realtime`) channels. Neither channel
 * connects before its first use.
 *
 * @example
 * ```typescript
 * const client = new Client('https://example.com')
 * client.authStore.save(token)
 *
 * await client.collection('posts').subscribe('*', ({ action, record }) => {
 *   console.log(action, record.id)
 * })
 * await client.pubsub.publish('chat', { text: 'hi' })
 *
 * client.close()
 * ```
 */

import { AuthStore } from './auth'
import { HttpClient } from './http'
import { PubSubClient } from './PubSubClient'
import { RealtimeClient } from './RealtimeClient'
import { RecordSubscriptions } from './records'
import { resolveClientConfig, type ClientConfig, type ClientOptions } from '../config'
import type { Logger } from '../logging'

export interface ChannelCallbacks {
  /** Topics dropped when the message-bus channel gave up reconnecting */
  onPubSubDisconnect?: (topics: string[]) => void
  /** Topics dropped when the record-change stream gave up reconnecting */
  onRealtimeDisconnect?: (topics: string[]) => void
}

export interface FullClientOptions extends ClientOptions, ChannelCallbacks {
  authStore?: AuthStore
}

export class Client {
  readonly baseUrl: string
  readonly authStore: AuthStore
  readonly http: HttpClient
  readonly pubsub: PubSubClient
  readonly realtime: RealtimeClient
  readonly logger: Logger
  private readonly config: ClientConfig
  private readonly collections = new Map<string, RecordSubscriptions>()

  constructor(baseUrl: string, options: FullClientOptions = {}) {
    this.config = resolveClientConfig(baseUrl, options)
    this.baseUrl = this.config.baseUrl
    this.logger = this.config.logger
    this.authStore = options.authStore ?? new AuthStore()

    this.http = new HttpClient(this.baseUrl, {
      fetch: this.config.fetch,
      timeout: this.config.timeout,
      lang: this.config.lang,
      authStore: this.authStore,
    })

    this.pubsub = new PubSubClient({
      baseUrl: this.baseUrl,
      authStore: this.authStore,
      createSocket: this.config.createSocket,
      ackTimeout: this.config.ackTimeout,
      handshakeTimeout: this.config.handshakeTimeout,
      maxReconnectAttempts: this.config.pubsubMaxReconnectAttempts,
      logger: this.logger,
      onDisconnect: options.onPubSubDisconnect,
      onError: this.config.onError,
    })

    this.realtime = new RealtimeClient({
      baseUrl: this.baseUrl,
      http: this.http,
      authStore: this.authStore,
      lang: this.config.lang,
      fetch: this.config.fetch,
      handshakeTimeout: this.config.handshakeTimeout,
      maxReconnectAttempts: this.config.realtimeMaxReconnectAttempts,
      logger: this.logger,
      onDisconnect: options.onRealtimeDisconnect,
      onError: this.config.onError,
    })
  }

  get lang(): string {
    return this.http.lang
  }

  /**
   * Record subscriptions scoped to the collection `name`.
   */
  collection(name: string): RecordSubscriptions {
    let collection = this.collections.get(name)
    if (!collection) {
      collection = new RecordSubscriptions(this.realtime, name)
      this.collections.set(name, collection)
    }
    return collection
  }

  /**
   * Closes both channels.
   */
  close(): void {
    this.pubsub.disconnect()
    this.realtime.disconnect()
  }
}
