/**
 * Message-Bus Envelope Codec
 *
 * Defines the frames exchanged over the pub/sub channel and converts them
 * to and from their JSON text form. Decoding is forward compatible: frames
 * with a `type` this client does not know are ignored.
 */

import { InvalidMessageError, MessageParseError } from '../client/errors'

// ============================================================================
// Inbound Envelopes
// ============================================================================

interface EnvelopeFields {
  id?: string
  topic?: string
  created?: string
  requestId?: string
  clientId?: string
  message?: string
  data?: unknown
}

export interface ReadyEnvelope extends EnvelopeFields {
  type: 'ready'
}

export interface MessageEnvelope extends EnvelopeFields {
  type: 'message'
}

export interface AckEnvelope extends EnvelopeFields {
  type: 'published' | 'subscribed' | 'unsubscribed' | 'pong'
}

export interface ErrorEnvelope extends EnvelopeFields {
  type: 'error'
}

/**
 * Any frame the server sends on the message-bus channel.
 */
export type Envelope = ReadyEnvelope | MessageEnvelope | AckEnvelope | ErrorEnvelope

export type EnvelopeType = Envelope['type']

const INBOUND_TYPES: ReadonlySet<string> = new Set<EnvelopeType>([
  'ready',
  'message',
  'published',
  'subscribed',
  'unsubscribed',
  'pong',
  'error',
])

const STRING_FIELDS = ['id', 'topic', 'created', 'requestId', 'clientId', 'message'] as const

export function isAckEnvelope(envelope: Envelope): envelope is AckEnvelope {
  return (
    envelope.type === 'published' ||
    envelope.type === 'subscribed' ||
    envelope.type === 'unsubscribed' ||
    envelope.type === 'pong'
  )
}

// ============================================================================
// Outbound Commands
// ============================================================================

export interface PublishCommand {
  type: 'publish'
  topic: string
  data?: unknown
  requestId: string
}

export interface SubscribeCommand {
  type: 'subscribe'
  topic: string
  requestId: string
}

/** Omitting `topic` unsubscribes everything. */
export interface UnsubscribeCommand {
  type: 'unsubscribe'
  topic?: string
  requestId?: string
}

export interface PingCommand {
  type: 'ping'
  requestId: string
}

export type Command = PublishCommand | SubscribeCommand | UnsubscribeCommand | PingCommand

// ============================================================================
// Encoding
// ============================================================================

/**
 * Serializes a command to its wire text. `undefined` fields are omitted;
 * a publish always carries `data` (`null` when none was given).
 */
export function encodeCommand(command: Command): string {
  if (command.type === 'publish') {
    return JSON.stringify({
      type: command.type,
      topic: command.topic,
      data: command.data === undefined ? null : command.data,
      requestId: command.requestId,
    })
  }
  return JSON.stringify(command)
}

// ============================================================================
// Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isEnvelopeType(value: string): value is EnvelopeType {
  return INBOUND_TYPES.has(value)
}

/**
 * Parses one inbound frame.
 *
 * @returns the envelope, or `null` when its `type` is not one this client handles
 * @throws MessageParseError when the text is not JSON
 * @throws InvalidMessageError when the JSON is not an object with a string `type`
 */
export function decodeEnvelope(text: string): Envelope | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new MessageParseError(
      `Failed to parse frame: ${error instanceof Error ? error.message : String(error)}`,
      text
    )
  }

  if (!isRecord(parsed)) {
    throw new InvalidMessageError('Frame must be a JSON object')
  }

  const type = parsed.type
  if (typeof type !== 'string') {
    throw new InvalidMessageError('Frame must have a string "type" field', 'type')
  }

  if (!isEnvelopeType(type)) {
    return null
  }

  const fields: EnvelopeFields = {}
  for (const field of STRING_FIELDS) {
    const value = parsed[field]
    if (typeof value === 'string') {
      fields[field] = value
    }
  }
  if ('data' in parsed) {
    fields.data = parsed.data
  }
  return { ...fields, type }
}

/**
 * Flattens an envelope into the record handed to a resolved waiter.
 */
export function envelopeToPayload(envelope: Envelope): Record<string, unknown> {
  const payload: Record<string, unknown> = { type: envelope.type }
  for (const field of STRING_FIELDS) {
    const value = envelope[field]
    if (value !== undefined) {
      payload[field] = value
    }
  }
  if (envelope.data !== undefined) {
    payload.data = envelope.data
  }
  return payload
}
