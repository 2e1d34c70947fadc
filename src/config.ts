/**
 * Client Configuration
 *
 * Resolves user-supplied options against defaults and validates them.
 */

import { ValidationError } from './client/errors'
import { DEFAULT_LANG, DEFAULT_TIMEOUT } from './client/http'
import { DEFAULT_ACK_TIMEOUT } from './sync/correlator'
import { DEFAULT_HANDSHAKE_TIMEOUT } from './sync/connection'
import type { SocketFactory } from './sync/websocket'
import { createDefaultLogger, type Logger } from './logging'

// ============================================================================
// Defaults
// ============================================================================

/** Reconnect attempts of the message-bus channel before giving up */
export const DEFAULT_PUBSUB_MAX_RECONNECT_ATTEMPTS = 10

/** Reconnect attempts of the record-change stream before giving up */
export const DEFAULT_REALTIME_MAX_RECONNECT_ATTEMPTS = 5

// ============================================================================
// Types
// ============================================================================

export interface ClientOptions {
  /** @default 'en-US' */
  lang?: string
  /** HTTP request timeout in milliseconds. @default 60000 */
  timeout?: number
  /** Time to wait for an acknowledgement in milliseconds. @default 10000 */
  ackTimeout?: number
  /** Time to wait for the connect handshake in milliseconds. @default 15000 */
  handshakeTimeout?: number
  /** @default 10 */
  pubsubMaxReconnectAttempts?: number
  /** @default 5 */
  realtimeMaxReconnectAttempts?: number
  fetch?: typeof fetch
  createSocket?: SocketFactory
  logger?: Logger
  /** Receives failures that have no caller to reject, such as a lost subscribe ack */
  onError?: (error: Error) => void
}

export interface ClientConfig {
  baseUrl: string
  lang: string
  timeout: number
  ackTimeout: number
  handshakeTimeout: number
  pubsubMaxReconnectAttempts: number
  realtimeMaxReconnectAttempts: number
  fetch?: typeof fetch
  createSocket?: SocketFactory
  logger: Logger
  onError?: (error: Error) => void
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Applies defaults to `options`.
 *
 * @throws ValidationError for an invalid base URL or a non-positive timeout
 */
export function resolveClientConfig(baseUrl: string, options: ClientOptions = {}): ClientConfig {
  const config: ClientConfig = {
    baseUrl: baseUrl.trim(),
    lang: options.lang ?? DEFAULT_LANG,
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    ackTimeout: options.ackTimeout ?? DEFAULT_ACK_TIMEOUT,
    handshakeTimeout: options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT,
    pubsubMaxReconnectAttempts: options.pubsubMaxReconnectAttempts ?? DEFAULT_PUBSUB_MAX_RECONNECT_ATTEMPTS,
    realtimeMaxReconnectAttempts: options.realtimeMaxReconnectAttempts ?? DEFAULT_REALTIME_MAX_RECONNECT_ATTEMPTS,
    fetch: options.fetch,
    createSocket: options.createSocket,
    logger: options.logger ?? createDefaultLogger(),
    onError: options.onError,
  }
  validateConfig(config)
  return config
}

function validateConfig(config: ClientConfig): void {
  if (!config.baseUrl) {
    throw new ValidationError('baseUrl is required', { field: 'baseUrl' })
  }
  let protocol: string
  try {
    protocol = new URL(config.baseUrl).protocol
  } catch (error) {
    throw new ValidationError(`Invalid baseUrl: ${config.baseUrl}`, { field: 'baseUrl', cause: error })
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError('baseUrl must use http or https', { field: 'baseUrl' })
  }

  const timeouts = ['timeout', 'ackTimeout', 'handshakeTimeout'] as const
  for (const field of timeouts) {
    if (!(config[field] > 0)) {
      throw new ValidationError(`${field} must be positive`, { field })
    }
  }

  const attempts = ['pubsubMaxReconnectAttempts', 'realtimeMaxReconnectAttempts'] as const
  for (const field of attempts) {
    if (Number.isNaN(config[field]) || config[field] < 0) {
      throw new ValidationError(`${field} must be non-negative`, { field })
    }
  }
}
