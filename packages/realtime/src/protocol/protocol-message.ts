/**
 * ProtocolMessage envelope and its JSON wire codec.
 *
 * Wire shape (one JSON object per frame):
 * `{ id, type, session_id?, payload, timestamp, version, correlation_id? }`
 *
 * @module protocol/protocol-message
 */

import {
  CodecError,
  formatIsoTimestamp,
  generateId,
  toError,
  tryParseIsoTimestamp,
} from '@repsync/core';
import { z } from 'zod';
import { MESSAGE_TYPES, type MessageType } from './message-types.js';

/** Payload record carried by an envelope */
export type MessagePayload = Readonly<Record<string, unknown>>;

/**
 * Immutable typed envelope exchanged over a channel
 */
export interface ProtocolMessage<TPayload extends MessagePayload = MessagePayload> {
  readonly id: string;
  readonly type: MessageType;
  /** Session the message is routed to */
  readonly sessionId?: string;
  readonly payload: TPayload;
  readonly timestamp: Date;
  readonly version: number;
  /** Links a response to the request that caused it */
  readonly correlationId?: string;
}

/**
 * Fields accepted by {@link createProtocolMessage}
 */
export interface ProtocolMessageInit {
  type: MessageType;
  payload?: MessagePayload;
  sessionId?: string;
  version?: number;
  correlationId?: string;
  id?: string;
  timestamp?: Date;
}

/**
 * Turns a raw frame into a value. Throwing drops the frame.
 */
export interface MessageDecoder<T> {
  readonly name: string;
  decode(frame: string | Uint8Array): T;
}

export const wireMessageSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.enum(MESSAGE_TYPES),
  session_id: z.string().nullish(),
  payload: z.record(z.string(), z.unknown()).default({}),
  timestamp: z.string(),
  version: z.number().int().default(0),
  correlation_id: z.string().nullish(),
});

export type WireMessage = z.input<typeof wireMessageSchema>;

/**
 * Create a frozen envelope. A fresh id and the current time are used
 * unless given.
 */
export function createProtocolMessage(init: ProtocolMessageInit): ProtocolMessage {
  const payload: MessagePayload = Object.freeze({ ...init.payload });
  return Object.freeze({
    id: init.id ?? generateId(),
    type: init.type,
    ...(init.sessionId !== undefined ? { sessionId: init.sessionId } : {}),
    payload,
    timestamp: init.timestamp ?? new Date(),
    version: init.version ?? 0,
    ...(init.correlationId !== undefined ? { correlationId: init.correlationId } : {}),
  });
}

/**
 * Serialize an envelope to its JSON wire form.
 *
 * @throws CodecError (REPSYNC_E700) when the payload cannot be serialized
 */
export function encodeProtocolMessage(message: ProtocolMessage): string {
  const wire: WireMessage = {
    id: message.id,
    type: message.type,
    ...(message.sessionId !== undefined ? { session_id: message.sessionId } : {}),
    payload: message.payload,
    timestamp: formatIsoTimestamp(message.timestamp),
    version: message.version,
    ...(message.correlationId !== undefined ? { correlation_id: message.correlationId } : {}),
  };

  try {
    return JSON.stringify(wire);
  } catch (error) {
    throw new CodecError(
      'REPSYNC_E700',
      `Unable to encode ${message.type} message: ${toError(error).message}`,
      { messageId: message.id, type: message.type },
      toError(error)
    );
  }
}

const textDecoder = new TextDecoder();

/**
 * Parse a wire frame into an envelope.
 *
 * @throws CodecError (REPSYNC_E701) for invalid JSON, an unknown type,
 * a malformed field or an unreadable timestamp
 */
export function decodeProtocolMessage(frame: string | Uint8Array): ProtocolMessage {
  const text = typeof frame === 'string' ? frame : textDecoder.decode(frame);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CodecError('REPSYNC_E701', 'Message is not valid JSON', {}, toError(error));
  }

  const result = wireMessageSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CodecError('REPSYNC_E701', `Invalid message envelope: ${issues.join('; ')}`, {
      issues,
    });
  }

  const wire = result.data;
  const timestamp = tryParseIsoTimestamp(wire.timestamp);
  if (timestamp === null) {
    throw new CodecError('REPSYNC_E701', `Unable to decode date: ${wire.timestamp}`, {
      type: wire.type,
    });
  }

  return createProtocolMessage({
    id: wire.id,
    type: wire.type,
    sessionId: wire.session_id ?? undefined,
    payload: wire.payload,
    timestamp,
    version: wire.version,
    correlationId: wire.correlation_id ?? undefined,
  });
}

/** Decoder used by `Connection.subscribe()` */
export const protocolMessageDecoder: MessageDecoder<ProtocolMessage> = {
  name: 'protocol-message',
  decode: decodeProtocolMessage,
};
