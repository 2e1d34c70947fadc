/**
 * Event-Stream Parser
 *
 * Incremental parser for `text/event-stream` bodies. Feed it raw text
 * chunks with `push()`; it splits them into lines and emits one
 * `StreamEvent` per blank-line-terminated record.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One dispatched record of the stream.
 */
export interface StreamEvent {
  /** Event name; `"message"` when the record carried no `event` field */
  event: string
  /** `data` lines joined by `\n`; absent when the record had none */
  data?: string
  /** Last `id` seen in the record */
  id?: string
}

export type StreamEventHandler = (event: StreamEvent) => void

const DEFAULT_EVENT_NAME = 'message'

// ============================================================================
// EventStreamParser
// ============================================================================

export class EventStreamParser {
  private eventName = DEFAULT_EVENT_NAME
  private dataLines: string[] = []
  private lastId: string | undefined
  private buffer = ''

  constructor(private readonly onEvent: StreamEventHandler) {}

  /**
   * Appends a chunk of body text. Complete lines are processed right away;
   * a trailing partial line waits for the next chunk.
   */
  push(chunk: string): void {
    this.buffer += chunk
    let newline = this.buffer.indexOf('\n')
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline)
      this.buffer = this.buffer.slice(newline + 1)
      if (line.endsWith('\r')) {
        line = line.slice(0, -1)
      }
      this.processLine(line)
      newline = this.buffer.indexOf('\n')
    }
  }

  /**
   * Processes any buffered partial line and then dispatches the record in
   * progress, if it has any field. Called when the body ends.
   */
  flush(): void {
    if (this.buffer.length > 0) {
      const rest = this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer
      this.buffer = ''
      this.processLine(rest)
    }
    if (this.hasPendingRecord()) {
      this.dispatch()
    }
  }

  /**
   * Processes one line without its terminator.
   */
  processLine(line: string): void {
    if (line === '') {
      this.dispatch()
      return
    }

    if (line.startsWith(':')) {
      return
    }

    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    // values are trimmed on both sides
    const value = colon === -1 ? '' : line.slice(colon + 1).trim()

    switch (field) {
      case 'event':
        this.eventName = value
        break
      case 'data':
        this.dataLines.push(value)
        break
      case 'id':
        this.lastId = value
        break
      default:
        break
    }
  }

  /** Clears buffered text and the record in progress. */
  reset(): void {
    this.buffer = ''
    this.resetRecord()
  }

  private dispatch(): void {
    const event: StreamEvent = { event: this.eventName }
    if (this.dataLines.length > 0) {
      event.data = this.dataLines.join('\n')
    }
    if (this.lastId !== undefined) {
      event.id = this.lastId
    }
    this.resetRecord()
    this.onEvent(event)
  }

  private hasPendingRecord(): boolean {
    return this.dataLines.length > 0 || this.lastId !== undefined || this.eventName !== DEFAULT_EVENT_NAME
  }

  private resetRecord(): void {
    this.eventName = DEFAULT_EVENT_NAME
    this.dataLines = []
    this.lastId = undefined
  }
}

/**
 * Parses a complete event-stream body in one go.
 */
export function parseEventStream(text: string): StreamEvent[] {
  const events: StreamEvent[] = []
  const parser = new EventStreamParser((event) => events.push(event))
  parser.push(text)
  return events
}
