/**
 * Reconnection Logic
 *
 * Backoff policy for the realtime channels: reconnect delays come from a
 * fixed ascending table indexed by the attempt counter, with the last entry
 * repeated once the table runs out.
 */

import { ValidationError } from '../client/errors'

// ============================================================================
// Backoff Tables
// ============================================================================

/** Delays (ms) used by the message-bus channel. */
export const PUBSUB_RECONNECT_INTERVALS: readonly number[] = [200, 300, 500, 1000, 1200, 1500, 2000]

/** Delays (ms) used by the record-change stream. */
export const REALTIME_RECONNECT_INTERVALS: readonly number[] = [300]

/**
 * Returns the delay before reconnect attempt number `attempt + 1`.
 *
 * @param attempt - attempts already made since the last successful connection
 */
export function backoffDelay(attempt: number, intervals: readonly number[] = PUBSUB_RECONNECT_INTERVALS): number {
  if (intervals.length === 0) {
    return 0
  }
  const index = Math.min(Math.max(0, Math.floor(attempt)), intervals.length - 1)
  return intervals[index] ?? 0
}

// ============================================================================
// Types
// ============================================================================

export type ReconnectionState = 'idle' | 'scheduled' | 'failed'

export interface ReconnectionConfig {
  /** Ascending delay table in milliseconds */
  intervals?: readonly number[]
  /** Maximum number of attempts before giving up. `Infinity` never gives up. */
  maxAttempts?: number
}

interface ResolvedConfig {
  intervals: readonly number[]
  maxAttempts: number
}

export interface ReconnectionStatus {
  state: ReconnectionState
  /** Attempts made since the last successful connection */
  attempt: number
  /** Delay of the scheduled attempt, or null when none is scheduled */
  scheduledDelay: number | null
  remainingAttempts: number
}

// ============================================================================
// ReconnectionManager Class
// ============================================================================

/**
 * Owns the attempt counter and the single pending reconnect timer.
 *
 * @example
 * ```typescript
 * const reconnect = new ReconnectionManager({ maxAttempts: 5 })
 * if (!reconnect.schedule(() => open())) {
 *   giveUp()
 * }
 * ```
 */
export class ReconnectionManager {
  private config: ResolvedConfig
  private attemptCount = 0
  private timer: ReturnType<typeof setTimeout> | null = null
  private scheduledDelay: number | null = null
  private failed = false

  constructor(config: ReconnectionConfig = {}) {
    this.config = {
      intervals: config.intervals ?? PUBSUB_RECONNECT_INTERVALS,
      maxAttempts: config.maxAttempts ?? Infinity,
    }
    this.validateConfig(this.config)
  }

  get attempt(): number {
    return this.attemptCount
  }

  getConfig(): ResolvedConfig {
    return { ...this.config }
  }

  getStatus(): ReconnectionStatus {
    let state: ReconnectionState = 'idle'
    if (this.failed) {
      state = 'failed'
    } else if (this.timer !== null) {
      state = 'scheduled'
    }
    return {
      state,
      attempt: this.attemptCount,
      scheduledDelay: this.scheduledDelay,
      remainingAttempts: Math.max(0, this.config.maxAttempts - this.attemptCount),
    }
  }

  isScheduled(): boolean {
    return this.timer !== null
  }

  /**
   * Whether another attempt is allowed under `maxAttempts`.
   */
  canRetry(): boolean {
    return this.attemptCount < this.config.maxAttempts
  }

  /**
   * Schedules `run` after the backoff delay for the current attempt and
   * increments the counter. Returns the delay, or null when the attempt
   * limit is exhausted (the manager is then `failed`). A second call while a
   * timer is pending keeps the existing timer.
   */
  schedule(run: () => void): number | null {
    if (this.timer !== null && this.scheduledDelay !== null) {
      return this.scheduledDelay
    }
    if (!this.canRetry()) {
      this.failed = true
      return null
    }

    const delay = backoffDelay(this.attemptCount, this.config.intervals)
    this.attemptCount++
    this.scheduledDelay = delay
    this.timer = setTimeout(() => {
      this.timer = null
      this.scheduledDelay = null
      run()
    }, delay)
    return delay
  }

  /**
   * Cancels a pending attempt without touching the counter.
   */
  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.scheduledDelay = null
  }

  /**
   * Resets the counter after a successful connection.
   */
  reset(): void {
    this.cancel()
    this.attemptCount = 0
    this.failed = false
  }

  private validateConfig(config: ResolvedConfig): void {
    if (config.intervals.some((delay) => !Number.isFinite(delay) || delay < 0)) {
      throw new ValidationError('reconnect intervals must be non-negative finite numbers', { field: 'intervals' })
    }
    for (let i = 1; i < config.intervals.length; i++) {
      const previous = config.intervals[i - 1] ?? 0
      const current = config.intervals[i] ?? 0
      if (current < previous) {
        throw new ValidationError('reconnect intervals must be ascending', { field: 'intervals' })
      }
    }
    if (Number.isNaN(config.maxAttempts) || config.maxAttempts < 0) {
      throw new ValidationError('maxAttempts must be non-negative', { field: 'maxAttempts' })
    }
  }
}
