/**
 * useRecordSubscription - latest change event of a collection topic
 */

import { useEffect, useRef, useState } from 'react'
import { useRealtimeClient } from './RealtimeProvider'
import { wrapError } from '../client/errors'
import type { Unsubscribe } from '../client/PubSubClient'
import type { RecordSubscription, RecordSubscriptionOptions } from '../client/records'

/**
 * Subscribes to record changes of `collection`/`topic` while mounted.
 * Options are compared by value, so an inline object does not resubscribe
 * on every render.
 *
 * @example
 * ```tsx
 * const change = useRecordSubscription('posts', '*', { filter: 'published = true' })
 * ```
 */
export function useRecordSubscription(
  collection: string,
  topic: string | 'skip',
  options?: RecordSubscriptionOptions
): RecordSubscription | undefined {
  const client = useRealtimeClient()
  const [event, setEvent] = useState<RecordSubscription | undefined>(undefined)
  const [error, setError] = useState<Error | null>(null)

  const optionsRef = useRef(options)
  optionsRef.current = options
  const optionsKey = options ? JSON.stringify(options) : ''

  useEffect(() => {
    setEvent(undefined)
    if (topic === 'skip') {
      return
    }

    let active = true
    let unsubscribe: Unsubscribe | null = null

    client
      .collection(collection)
      .subscribe(
        topic,
        (next) => {
          if (active) setEvent(next)
        },
        optionsRef.current
      )
      .then(
        (off) => {
          if (active) {
            unsubscribe = off
          } else {
            void off()
          }
        },
        (err: unknown) => {
          if (active) setError(wrapError(err))
        }
      )

    return () => {
      active = false
      if (unsubscribe) {
        void unsubscribe()
      }
    }
  }, [client, collection, topic, optionsKey])

  if (error) {
    throw error
  }

  return event
}
