/**
 * tidewire - realtime subscription and correlation engine
 *
 * Topic pub/sub over WebSocket and record-change notifications over an
 * event stream, sharing one connection lifecycle, backoff policy,
 * subscription registry and request correlator.
 */

export * from './client'
export * from './sync'

export { resolveClientConfig } from './config'
export {
  DEFAULT_PUBSUB_MAX_RECONNECT_ATTEMPTS,
  DEFAULT_REALTIME_MAX_RECONNECT_ATTEMPTS,
} from './config'
export type { ClientConfig, ClientOptions } from './config'

export { createLogger, createConsoleHandler, createDefaultLogger, createNoopLogger, formatLogEntry } from './logging'
export type { LogContext, LogEntry, LogFilter, LogHandler, LogLevel, Logger, LoggerOptions } from './logging'
