/**
 * Event-Stream Transport
 *
 * Receive-only transport for the record-change channel: a long-lived
 * `GET` whose `text/event-stream` body is parsed into `StreamEvent`s.
 */

import { ClientResponseError, ConnectionError } from '../client/errors'
import { createDefaultLogger, type Logger } from '../logging'
import { EventStreamParser, type StreamEvent } from './event-stream'
import type { Transport, TransportSink } from './transport'

export interface EventStreamRequest {
  url: string
  headers: Record<string, string>
}

export interface EventStreamTransportOptions {
  /** Resolved at `open()`, so refreshed auth headers are picked up on reconnect */
  request: () => EventStreamRequest
  fetch?: typeof fetch
  logger?: Logger
}

export class EventStreamTransport implements Transport<StreamEvent> {
  private controller: AbortController | null = null
  private closed = false
  private readonly options: EventStreamTransportOptions
  private readonly logger: Logger

  constructor(options: EventStreamTransportOptions) {
    this.options = options
    this.logger = options.logger ?? createDefaultLogger()
  }

  open(sink: TransportSink<StreamEvent>): void {
    const controller = new AbortController()
    this.controller = controller
    this.run(sink, controller.signal).catch((error: unknown) => {
      this.finish(sink, new ConnectionError('Event stream failed', { cause: error }))
    })
  }

  send(): void {
    throw new ConnectionError('Event stream is receive-only.')
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.controller?.abort()
    this.controller = null
  }

  private async run(sink: TransportSink<StreamEvent>, signal: AbortSignal): Promise<void> {
    const { url, headers } = this.options.request()
    const fetchImpl = this.options.fetch ?? globalThis.fetch

    let response: Response
    try {
      response = await fetchImpl(url, { method: 'GET', headers, signal })
    } catch (error) {
      this.finish(sink, new ConnectionError('Failed to open event stream', { cause: error, url }))
      return
    }

    if (!response.ok) {
      this.finish(
        sink,
        new ClientResponseError(`Event stream request failed with status ${response.status}`, {
          url,
          status: response.status,
        })
      )
      return
    }

    if (!response.body) {
      this.finish(sink, new ConnectionError('Event stream response has no body', { url }))
      return
    }

    const parser = new EventStreamParser((event) => {
      if (!this.closed) sink.onFrame(event)
    })
    const reader = response.body.getReader()
    const decoder = new TextDecoder()

    try {
      for (;;) {
        const { done, value } = await reader.read()
        if (done || this.closed) break
        parser.push(decoder.decode(value, { stream: true }))
      }
    } catch (error) {
      this.finish(sink, new ConnectionError('Event stream interrupted', { cause: error, url }))
      return
    }

    if (this.closed) return
    parser.push(decoder.decode())
    parser.flush()
    this.finish(sink, new ConnectionError('Event stream ended', { url }))
  }

  private finish(sink: TransportSink<StreamEvent>, error: Error): void {
    if (this.closed) return
    this.closed = true
    this.controller = null
    this.logger.debug('Event stream closed', { error })
    sink.onClose(error)
  }
}
