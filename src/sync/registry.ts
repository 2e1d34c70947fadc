/**
 * Subscription Registry
 *
 * Reference-counted mapping from topic key to listeners. The registry is
 * the only owner of that mapping: callers go through the operations below,
 * which keep a key present exactly while it has at least one listener.
 *
 * @module sync/registry
 */

import { createDefaultLogger, type Logger } from '../logging'

// ============================================================================
// Types
// ============================================================================

export type Listener<TMessage> = (message: TMessage) => void

export type ListenerId = string

export interface AddListenerResult {
  listenerId: ListenerId
  /** True when this is the first listener of the key */
  needsSubscribe: boolean
}

export interface RemoveTopicResult {
  /** Keys that were removed */
  removed: string[]
  /** Whether any key still has listeners */
  hasActiveTopics: boolean
}

export interface SubscriptionRegistryOptions {
  logger?: Logger
}

// ============================================================================
// SubscriptionRegistry
// ============================================================================

export class SubscriptionRegistry<TMessage> {
  private readonly topics = new Map<string, Map<ListenerId, Listener<TMessage>>>()
  private readonly logger: Logger
  private idCounter = 0

  constructor(options: SubscriptionRegistryOptions = {}) {
    this.logger = options.logger ?? createDefaultLogger()
  }

  /**
   * Registers `listener` under `topicKey`.
   */
  addListener(topicKey: string, listener: Listener<TMessage>): AddListenerResult {
    let listeners = this.topics.get(topicKey)
    const needsSubscribe = !listeners || listeners.size === 0
    if (!listeners) {
      listeners = new Map()
      this.topics.set(topicKey, listeners)
    }
    const listenerId = `listener_${++this.idCounter}`
    listeners.set(listenerId, listener)
    return { listenerId, needsSubscribe }
  }

  /**
   * Removes one listener; the key goes away with its last listener.
   *
   * @returns the number of listeners left across all keys
   */
  removeListener(topicKey: string, listenerId: ListenerId): number {
    const listeners = this.topics.get(topicKey)
    if (listeners) {
      listeners.delete(listenerId)
      if (listeners.size === 0) {
        this.topics.delete(topicKey)
      }
    }
    return this.listenerCount()
  }

  /**
   * Removes exactly `topicKey`. Without a key, removes everything.
   */
  removeTopic(topicKey?: string): RemoveTopicResult {
    if (topicKey === undefined) {
      const removed = Array.from(this.topics.keys())
      this.topics.clear()
      return { removed, hasActiveTopics: false }
    }
    return this.removeMatching((key) => key === topicKey)
  }

  /**
   * Removes `topic` together with every option variant of it
   * (`topic?options=...`).
   */
  removeTopicVariants(topic: string): RemoveTopicResult {
    const normalized = topic.includes('?') ? topic : `${topic}?`
    return this.removeMatching((key) => `${key}?`.startsWith(normalized))
  }

  /**
   * Removes every key starting with `prefix`.
   */
  removeByPrefix(prefix: string): RemoveTopicResult {
    return this.removeMatching((key) => key.startsWith(prefix))
  }

  /**
   * Snapshot of the keys that currently have listeners.
   */
  activeTopics(): string[] {
    const active: string[] = []
    for (const [key, listeners] of this.topics) {
      if (listeners.size > 0) {
        active.push(key)
      }
    }
    return active
  }

  hasActiveTopics(): boolean {
    return this.activeTopics().length > 0
  }

  has(topicKey: string): boolean {
    return (this.topics.get(topicKey)?.size ?? 0) > 0
  }

  /**
   * Listener count of one key, or of all keys when called without one.
   */
  listenerCount(topicKey?: string): number {
    if (topicKey !== undefined) {
      return this.topics.get(topicKey)?.size ?? 0
    }
    let total = 0
    for (const listeners of this.topics.values()) {
      total += listeners.size
    }
    return total
  }

  /**
   * Delivers `message` to the listeners of `topicKey`. The listener set is
   * copied before the first call, so listeners may subscribe or unsubscribe
   * from inside the callback.
   *
   * @returns the number of listeners invoked
   */
  fanOut(topicKey: string, message: TMessage): number {
    const listeners = this.topics.get(topicKey)
    if (!listeners || listeners.size === 0) {
      return 0
    }

    const snapshot = Array.from(listeners.values())
    for (const listener of snapshot) {
      try {
        listener(message)
      } catch (error) {
        this.logger.error('Listener threw during fan-out', { topic: topicKey, error })
      }
    }
    return snapshot.length
  }

  clear(): void {
    this.topics.clear()
  }

  private removeMatching(predicate: (key: string) => boolean): RemoveTopicResult {
    const removed: string[] = []
    for (const key of Array.from(this.topics.keys())) {
      if (predicate(key)) {
        this.topics.delete(key)
        removed.push(key)
      }
    }
    return { removed, hasActiveTopics: this.hasActiveTopics() }
  }
}
