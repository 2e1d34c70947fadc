/**
 * Record subscriptions of one collection
 *
 * Thin layer over `RealtimeClient` that scopes topics to a collection
 * (`<collection>/<topic>`) and unwraps record-change events.
 *
 * @module client/records
 */

import { ValidationError } from './errors'
import type { Unsubscribe } from './PubSubClient'
import type { RealtimeClient, RealtimeSubscriptionOptions } from './RealtimeClient'

// ============================================================================
// Types
// ============================================================================

export interface RecordModel {
  id?: string
  collectionName?: string
  [key: string]: unknown
}

export interface RecordSubscription {
  /** `create`, `update` or `delete` */
  action: string
  record: RecordModel
}

export interface RecordSubscriptionOptions {
  /** Comma separated fields to return */
  fields?: string
  filter?: string
  /** Comma separated relations to expand */
  expand?: string
  query?: Record<string, unknown>
  headers?: Record<string, string>
}

/**
 * Folds the record-specific options into the realtime query.
 */
export function toRealtimeOptions(options: RecordSubscriptionOptions): RealtimeSubscriptionOptions {
  const query: Record<string, unknown> = { ...options.query }
  if (options.fields !== undefined) query.fields = options.fields
  if (options.filter !== undefined) query.filter = options.filter
  if (options.expand !== undefined) query.expand = options.expand
  return { query, headers: options.headers }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toRecordModel(value: Record<string, unknown>): RecordModel {
  const { id, collectionName, ...rest } = value
  const model: RecordModel = { ...rest }
  if (typeof id === 'string') model.id = id
  if (typeof collectionName === 'string') model.collectionName = collectionName
  return model
}

// ============================================================================
// RecordSubscriptions
// ============================================================================

/**
 * @example
 * ```typescript
 * const unsubscribe = await client.collection('posts').subscribe('*', ({ action, record }) => {
 *   console.log(action, record.id)
 * })
 * ```
 */
export class RecordSubscriptions {
  readonly collection: string
  private readonly realtime: RealtimeClient

  constructor(realtime: RealtimeClient, collection: string) {
    this.realtime = realtime
    this.collection = collection
  }

  /**
   * Subscribes to changes of `topic` in this collection: `*` for every
   * record, or a record id.
   *
   * @throws ValidationError when `topic` is empty
   */
  async subscribe(
    topic: string,
    callback: (event: RecordSubscription) => void,
    options?: RecordSubscriptionOptions
  ): Promise<Unsubscribe> {
    if (!topic) {
      throw new ValidationError('Missing topic.', { field: 'topic' })
    }

    return this.realtime.subscribe(
      `${this.collection}/${topic}`,
      (message) => {
        const record = message.payload.record
        if (message.action === undefined || !isRecord(record)) {
          return
        }
        callback({ action: message.action, record: toRecordModel(record) })
      },
      options ? toRealtimeOptions(options) : undefined
    )
  }

  /**
   * Drops `topic` of this collection, or all of its topics when called
   * without one.
   */
  async unsubscribe(topic?: string): Promise<void> {
    if (topic) {
      await this.realtime.unsubscribe(`${this.collection}/${topic}`)
    } else {
      await this.realtime.unsubscribeByPrefix(this.collection)
    }
  }
}
