/**
 * Pending-Request Correlator
 *
 * Turns "send a command, wait for the matching reply" into one awaitable
 * result. Each entry owns its timeout timer; the first of resolve, reject,
 * timeout or `rejectAll` removes the entry and settles the promise.
 */

import { randomUUID } from 'node:crypto'
import { AckTimeoutError, ValidationError } from '../client/errors'

// ============================================================================
// Constants
// ============================================================================

/** Default time to wait for an acknowledgement, in milliseconds */
export const DEFAULT_ACK_TIMEOUT = 10_000

// ============================================================================
// Types
// ============================================================================

interface PendingRequest {
  requestId: string
  resolve: (payload: Record<string, unknown>) => void
  reject: (error: Error) => void
  timer: ReturnType<typeof setTimeout>
}

export interface RegisterOptions<T> {
  /** Maps the acknowledgement payload to the awaited value */
  map?: (payload: Record<string, unknown>) => T
}

export interface CorrelatorOptions {
  /** Timeout applied to every registered request */
  timeout?: number
}

// ============================================================================
// Request IDs
// ============================================================================

/**
 * Creates an opaque request id: 32 lowercase hex characters.
 */
export function createRequestId(): string {
  return randomUUID().replace(/-/g, '')
}

// ============================================================================
// PendingRequestCorrelator
// ============================================================================

export class PendingRequestCorrelator {
  private readonly pending = new Map<string, PendingRequest>()
  private readonly timeout: number

  constructor(options: CorrelatorOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_ACK_TIMEOUT
    if (!(this.timeout > 0)) {
      throw new ValidationError('ack timeout must be positive', { field: 'timeout' })
    }
  }

  /** Number of requests awaiting a reply */
  get size(): number {
    return this.pending.size
  }

  has(requestId: string): boolean {
    return this.pending.has(requestId)
  }

  /**
   * Registers a waiter for `requestId` and starts its timeout.
   *
   * @throws ValidationError when the id is already pending
   */
  register(requestId: string): Promise<Record<string, unknown>>
  register<T>(requestId: string, options: RegisterOptions<T> & { map: (payload: Record<string, unknown>) => T }): Promise<T>
  register<T>(requestId: string, options: RegisterOptions<T> = {}): Promise<T | Record<string, unknown>> {
    if (this.pending.has(requestId)) {
      throw new ValidationError(`request ${requestId} is already pending`, { field: 'requestId' })
    }

    const map = options.map
    return new Promise<T | Record<string, unknown>>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.get(requestId)?.timer !== timer) return
        this.pending.delete(requestId)
        reject(
          new AckTimeoutError('Timed out waiting for response.', {
            requestId,
            timeout: this.timeout,
          })
        )
      }, this.timeout)

      this.pending.set(requestId, {
        requestId,
        timer,
        reject,
        resolve: (payload) => {
          if (!map) {
            resolve(payload)
            return
          }
          try {
            resolve(map(payload))
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)))
          }
        },
      })
    })
  }

  /**
   * Settles `requestId` with `payload`. Returns false for unknown ids.
   */
  resolve(requestId: string, payload: Record<string, unknown>): boolean {
    const entry = this.take(requestId)
    if (!entry) return false
    entry.resolve(payload)
    return true
  }

  /**
   * Fails `requestId` with `error`. Returns false for unknown ids.
   */
  reject(requestId: string, error: Error): boolean {
    const entry = this.take(requestId)
    if (!entry) return false
    entry.reject(error)
    return true
  }

  /**
   * Drains the table and fails every entry. Returns the number rejected.
   */
  rejectAll(error: Error): number {
    const entries = Array.from(this.pending.values())
    this.pending.clear()
    for (const entry of entries) {
      clearTimeout(entry.timer)
      entry.reject(error)
    }
    return entries.length
  }

  private take(requestId: string): PendingRequest | undefined {
    const entry = this.pending.get(requestId)
    if (!entry) return undefined
    this.pending.delete(requestId)
    clearTimeout(entry.timer)
    return entry
  }
}
