/**
 * useTopic - latest message of a message-bus topic
 */

import { useEffect, useState } from 'react'
import { useRealtimeClient } from './RealtimeProvider'
import { wrapError } from '../client/errors'
import type { PubSubMessage, Unsubscribe } from '../client/PubSubClient'

/**
 * Subscribes to `topic` while the component is mounted and returns the
 * most recent message, or `undefined` before the first one. Pass `'skip'`
 * to stay unsubscribed.
 *
 * @example
 * ```tsx
 * function LastMessage() {
 *   const message = useTopic('chat')
 *   return <p>{message ? String(message.data) : 'waiting...'}</p>
 * }
 * ```
 */
export function useTopic(topic: string | 'skip'): PubSubMessage | undefined {
  const client = useRealtimeClient()
  const [message, setMessage] = useState<PubSubMessage | undefined>(undefined)
  const [error, setError] = useState<Error | null>(null)

  useEffect(() => {
    setMessage(undefined)
    if (topic === 'skip') {
      return
    }

    let active = true
    let unsubscribe: Unsubscribe | null = null

    client.pubsub
      .subscribe(topic, (next) => {
        if (active) setMessage(next)
      })
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
  }, [client, topic])

  // Throw error for error boundary
  if (error) {
    throw error
  }

  return message
}
