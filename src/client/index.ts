/**
 * Client SDK exports
 */

export { Client } from './Client'
export { PubSubClient, buildPubSubURL } from './PubSubClient'
export { RealtimeClient, makeSubscriptionKey, stableStringify, REALTIME_PATH, CONNECT_EVENT } from './RealtimeClient'
export { RecordSubscriptions, toRealtimeOptions } from './records'
export { HttpClient, buildURL, serializeQueryParams, DEFAULT_LANG, DEFAULT_TIMEOUT } from './http'
export { AuthStore, parseJWT, isTokenExpired } from './auth'

export {
  ErrorCode,
  BaseRealtimeError,
  ConnectionError,
  TimeoutError,
  HandshakeTimeoutError,
  AckTimeoutError,
  ServerError,
  ValidationError,
  ClientResponseError,
  MessageParseError,
  InvalidMessageError,
  createErrorContext,
  wrapError,
  getUserFriendlyMessage,
  isBaseRealtimeError,
  isConnectionError,
  isTimeoutError,
  isAckTimeoutError,
  isServerError,
  isValidationError,
  isClientResponseError,
} from './errors'

export type { ChannelCallbacks, FullClientOptions } from './Client'
export type {
  PubSubClientOptions,
  PubSubMessage,
  PubSubListener,
  PublishAck,
  Unsubscribe,
} from './PubSubClient'
export type {
  RealtimeClientOptions,
  RealtimeMessage,
  RealtimeListener,
  RealtimeSubscriptionOptions,
} from './RealtimeClient'
export type { RecordModel, RecordSubscription, RecordSubscriptionOptions } from './records'
export type { HttpClientOptions, HttpMethod, QueryParams, RequestSender, SendOptions } from './http'
export type { AuthChangeCallback, AuthRecord, AuthStoreOptions, TokenClaims, TokenStorage } from './auth'
export type { ErrorContext } from './errors'
