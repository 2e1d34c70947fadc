/**
 * Client Error Handling
 *
 * Error taxonomy shared by the realtime engine, the HTTP primitive and the
 * façades. Every failure surfaced to a caller is a `BaseRealtimeError`
 * carrying an `ErrorCode` and a human-readable message.
 */

// ============================================================================
// Error Code Enum
// ============================================================================

/**
 * Error codes for categorizing errors in the client.
 */
export enum ErrorCode {
  /** Transport could not be established or was closed */
  CONNECTION = 'CONNECTION',
  /** No ready frame within the handshake bound */
  HANDSHAKE_TIMEOUT = 'HANDSHAKE_TIMEOUT',
  /** No matching acknowledgement within the ack bound */
  ACK_TIMEOUT = 'ACK_TIMEOUT',
  /** Explicit error frame from the server */
  SERVER = 'SERVER',
  /** Invalid caller input (empty topic, missing field) */
  VALIDATION = 'VALIDATION',
  /** Non-success HTTP response */
  HTTP = 'HTTP',
  /** Malformed wire frame */
  PROTOCOL = 'PROTOCOL',
  /** Unknown or unclassified errors */
  UNKNOWN = 'UNKNOWN',
}

// ============================================================================
// Error Context Type
// ============================================================================

/**
 * Context information attached to errors for debugging and tracing.
 */
export interface ErrorContext {
  /** The operation during which the error occurred */
  operation: string
  /** Topic involved, if any */
  topic?: string
  /** Request id involved, if any */
  requestId?: string
  /** Timestamp when the error occurred */
  timestamp: number
  /** Custom metadata */
  metadata?: Record<string, unknown>
}

// ============================================================================
// Base Error Class
// ============================================================================

export interface BaseRealtimeErrorOptions {
  cause?: unknown
  context?: ErrorContext
}

/**
 * Base class for all client errors.
 */
export class BaseRealtimeError extends Error {
  /** Error code categorizing the error type */
  readonly code: ErrorCode
  /** Timestamp when the error was created */
  readonly timestamp: number
  /** Original error that caused this error */
  readonly cause?: unknown
  /** Context information for debugging */
  context?: ErrorContext

  constructor(message: string, code: ErrorCode, options?: BaseRealtimeErrorOptions) {
    super(message)
    this.name = 'BaseRealtimeError'
    this.code = code
    this.timestamp = Date.now()
    this.cause = options?.cause
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

// ============================================================================
// ConnectionError
// ============================================================================

export interface ConnectionErrorOptions extends BaseRealtimeErrorOptions {
  url?: string
  closeCode?: number
  reason?: string
}

/**
 * The transport could not be established or was closed.
 */
export class ConnectionError extends BaseRealtimeError {
  /** URL of the channel */
  readonly url?: string
  /** WebSocket close code, when known */
  readonly closeCode?: number
  /** Close reason, when known */
  readonly reason?: string

  constructor(message: string, options?: ConnectionErrorOptions) {
    super(message, ErrorCode.CONNECTION, options)
    this.name = 'ConnectionError'
    this.url = options?.url
    this.closeCode = options?.closeCode
    this.reason = options?.reason
  }
}

// ============================================================================
// Timeout Errors
// ============================================================================

export interface TimeoutErrorOptions extends BaseRealtimeErrorOptions {
  timeout?: number
}

/**
 * Base class for the two timeouts the engine enforces.
 */
export class TimeoutError extends BaseRealtimeError {
  /** Configured timeout in milliseconds */
  readonly timeout?: number

  constructor(message: string, code: ErrorCode.HANDSHAKE_TIMEOUT | ErrorCode.ACK_TIMEOUT, options?: TimeoutErrorOptions) {
    super(message, code, options)
    this.name = 'TimeoutError'
    this.timeout = options?.timeout
  }
}

/**
 * No connection-ready frame arrived within the handshake bound.
 */
export class HandshakeTimeoutError extends TimeoutError {
  constructor(message: string, options?: TimeoutErrorOptions) {
    super(message, ErrorCode.HANDSHAKE_TIMEOUT, options)
    this.name = 'HandshakeTimeoutError'
  }
}

export interface AckTimeoutErrorOptions extends TimeoutErrorOptions {
  requestId?: string
}

/**
 * No acknowledgement for a request id arrived within the ack bound.
 */
export class AckTimeoutError extends TimeoutError {
  readonly requestId?: string

  constructor(message: string, options?: AckTimeoutErrorOptions) {
    super(message, ErrorCode.ACK_TIMEOUT, options)
    this.name = 'AckTimeoutError'
    this.requestId = options?.requestId
  }
}

// ============================================================================
// ServerError
// ============================================================================

export interface ServerErrorOptions extends BaseRealtimeErrorOptions {
  requestId?: string
}

/**
 * The server answered a command with an explicit error frame.
 */
export class ServerError extends BaseRealtimeError {
  /** Request id of the rejected command */
  readonly requestId?: string

  constructor(message: string, options?: ServerErrorOptions) {
    super(message, ErrorCode.SERVER, options)
    this.name = 'ServerError'
    this.requestId = options?.requestId
  }
}

// ============================================================================
// ValidationError
// ============================================================================

export interface ValidationErrorOptions extends BaseRealtimeErrorOptions {
  field?: string
}

/**
 * Invalid caller input; always raised before any network activity.
 */
export class ValidationError extends BaseRealtimeError {
  /** The field that failed validation */
  readonly field?: string

  constructor(message: string, options?: ValidationErrorOptions) {
    super(message, ErrorCode.VALIDATION, options)
    this.name = 'ValidationError'
    this.field = options?.field
  }
}

// ============================================================================
// ClientResponseError
// ============================================================================

export interface ClientResponseErrorOptions extends BaseRealtimeErrorOptions {
  url?: string
  status?: number
  response?: Record<string, unknown>
  isAbort?: boolean
}

/**
 * Failure of an HTTP request made through the request primitive.
 * `status` is 0 when no response was received.
 */
export class ClientResponseError extends BaseRealtimeError {
  readonly url?: string
  readonly status: number
  readonly response: Record<string, unknown>
  /** Whether the request was aborted (timeout or caller signal) */
  readonly isAbort: boolean

  constructor(message: string, options?: ClientResponseErrorOptions) {
    super(message, ErrorCode.HTTP, options)
    this.name = 'ClientResponseError'
    this.url = options?.url
    this.status = options?.status ?? 0
    this.response = options?.response ?? {}
    this.isAbort = options?.isAbort ?? false
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Error thrown when a frame is not valid JSON.
 */
export class MessageParseError extends BaseRealtimeError {
  readonly rawInput?: string

  constructor(message: string, rawInput?: string) {
    super(message, ErrorCode.PROTOCOL)
    this.name = 'MessageParseError'
    this.rawInput = rawInput
  }
}

/**
 * Error thrown when a frame is JSON but not an envelope.
 */
export class InvalidMessageError extends BaseRealtimeError {
  readonly field?: string

  constructor(message: string, field?: string) {
    super(message, ErrorCode.PROTOCOL)
    this.name = 'InvalidMessageError'
    this.field = field
  }
}

// ============================================================================
// Wrapping and Context
// ============================================================================

/**
 * Create an error context object.
 */
export function createErrorContext(
  operation: string,
  additional?: Partial<Omit<ErrorContext, 'operation' | 'timestamp'>>
): ErrorContext {
  return {
    operation,
    timestamp: Date.now(),
    ...additional,
  }
}

/**
 * Normalizes any thrown value into a `BaseRealtimeError`. Errors that
 * already belong to the hierarchy are returned as they are.
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN, message?: string): BaseRealtimeError {
  if (error instanceof BaseRealtimeError) {
    return error
  }

  if (!(error instanceof Error)) {
    const msg = message ?? (typeof error === 'string' ? error : String(error))
    return new BaseRealtimeError(msg, code)
  }

  const wrappedMessage = message ?? error.message
  switch (code) {
    case ErrorCode.CONNECTION:
      return new ConnectionError(wrappedMessage, { cause: error })
    case ErrorCode.SERVER:
      return new ServerError(wrappedMessage, { cause: error })
    case ErrorCode.VALIDATION:
      return new ValidationError(wrappedMessage, { cause: error })
    case ErrorCode.HTTP:
      return new ClientResponseError(wrappedMessage, { cause: error })
    default:
      return new BaseRealtimeError(wrappedMessage, code, { cause: error })
  }
}

// ============================================================================
// User-Friendly Error Messages
// ============================================================================

/**
 * Get a user-facing message for an error.
 */
export function getUserFriendlyMessage(error: Error): string {
  if (error instanceof ValidationError) {
    if (error.field) {
      return `Please check the ${error.field} value and try again.`
    }
    return 'Invalid input. Please check your data and try again.'
  }

  if (error instanceof ConnectionError || error instanceof HandshakeTimeoutError) {
    return 'The realtime connection is unavailable. Please check your connection and try again.'
  }

  if (error instanceof AckTimeoutError) {
    return 'The server did not confirm the request in time. Please try again.'
  }

  if (error instanceof ServerError) {
    return error.message
  }

  if (error instanceof ClientResponseError) {
    if (error.status === 401 || error.status === 403) {
      return 'Authentication required. Please sign in to continue.'
    }
    if (error.status === 0) {
      return 'A network error occurred. Please check your connection and try again.'
    }
    return 'Something went wrong on our end. Please try again later.'
  }

  return 'An unexpected error occurred. Please try again.'
}

// ============================================================================
// Type Guards
// ============================================================================

export function isBaseRealtimeError(value: unknown): value is BaseRealtimeError {
  return value instanceof BaseRealtimeError
}

export function isConnectionError(value: unknown): value is ConnectionError {
  return value instanceof ConnectionError
}

export function isTimeoutError(value: unknown): value is TimeoutError {
  return value instanceof TimeoutError
}

export function isAckTimeoutError(value: unknown): value is AckTimeoutError {
  return value instanceof AckTimeoutError
}

export function isServerError(value: unknown): value is ServerError {
  return value instanceof ServerError
}

export function isValidationError(value: unknown): value is ValidationError {
  return value instanceof ValidationError
}

export function isClientResponseError(value: unknown): value is ClientResponseError {
  return value instanceof ClientResponseError
}
