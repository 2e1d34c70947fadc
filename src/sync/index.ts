/**
 * Sync Module
 *
 * The transport-independent core of the realtime engine:
 * - Envelope and event-stream codecs
 * - Backoff policy
 * - Pending-request correlation
 * - Subscription reference counting
 * - Connection lifecycle
 */

export {
  encodeCommand,
  decodeEnvelope,
  envelopeToPayload,
  isAckEnvelope,
  type Envelope,
  type EnvelopeType,
  type ReadyEnvelope,
  type MessageEnvelope,
  type AckEnvelope,
  type ErrorEnvelope,
  type Command,
  type PublishCommand,
  type SubscribeCommand,
  type UnsubscribeCommand,
  type PingCommand,
} from './envelope'

export {
  EventStreamParser,
  parseEventStream,
  type StreamEvent,
  type StreamEventHandler,
} from './event-stream'

export {
  ReconnectionManager,
  backoffDelay,
  PUBSUB_RECONNECT_INTERVALS,
  REALTIME_RECONNECT_INTERVALS,
  type ReconnectionConfig,
  type ReconnectionState,
  type ReconnectionStatus,
} from './reconnect'

export {
  PendingRequestCorrelator,
  createRequestId,
  DEFAULT_ACK_TIMEOUT,
  type CorrelatorOptions,
  type RegisterOptions,
} from './correlator'

export {
  SubscriptionRegistry,
  type Listener,
  type ListenerId,
  type AddListenerResult,
  type RemoveTopicResult,
  type SubscriptionRegistryOptions,
} from './registry'

export {
  ConnectionManager,
  ConnectionState,
  DEFAULT_HANDSHAKE_TIMEOUT,
  type ConnectionManagerOptions,
  type ReadyInfo,
  type StateChangeListener,
} from './connection'

export type { Transport, TransportSink, TransportFactory } from './transport'

export {
  WebSocketTransport,
  createSocket,
  rawDataToString,
  type SocketLike,
  type SocketFactory,
  type WebSocketTransportOptions,
} from './websocket'

export {
  EventStreamTransport,
  type EventStreamRequest,
  type EventStreamTransportOptions,
} from './stream'
