/**
 * Translates between ProtocolMessage envelopes and session events.
 *
 * @module session-protocol-handler
 */

import { CodecError, ServerError, createLogger, toError, type Logger } from '@repsync/core';
import {
  createProtocolMessage,
  type MessageType,
  type ProtocolMessage,
} from '@repsync/realtime';
import { Subject, type Observable, type Subscription } from 'rxjs';
import {
  SESSION_PAYLOAD_SCHEMAS,
  commandToPayload,
  type SessionCommand,
  type SessionEvent,
  type SessionPayloadSchemas,
} from './schemas.js';
import type { SessionStateStore } from './session-state-store.js';

export interface SessionProtocolHandlerOptions {
  /** Payload schemas by message type (default: {@link SESSION_PAYLOAD_SCHEMAS}) */
  schemas?: SessionPayloadSchemas;
  logger?: Logger;
}

export interface EncodeOptions {
  version?: number;
  correlationId?: string;
  sessionId?: string;
}

/**
 * Decodes inbound envelopes, applies them to the store, and encodes
 * local mutations for sending.
 */
export class SessionProtocolHandler {
  private readonly schemas: SessionPayloadSchemas;
  private readonly logger: Logger;
  private readonly serverErrorsSubject = new Subject<ServerError>();
  private readonly syncRequestsSubject = new Subject<ProtocolMessage>();

  constructor(
    private readonly store: SessionStateStore,
    options: SessionProtocolHandlerOptions = {}
  ) {
    this.schemas = options.schemas ?? SESSION_PAYLOAD_SCHEMAS;
    this.logger = options.logger ?? createLogger({ module: 'session-protocol' });
  }

  /** `error` frames from the server */
  get serverErrors$(): Observable<ServerError> {
    return this.serverErrorsSubject.asObservable();
  }

  /** Inbound `sync_request` envelopes. The client never answers them itself. */
  get syncRequests$(): Observable<ProtocolMessage> {
    return this.syncRequestsSubject.asObservable();
  }

  /**
   * Validate a message payload against the schema for its type.
   *
   * @throws CodecError (`REPSYNC_E701`) for an unregistered type or an invalid payload
   */
  decode(message: ProtocolMessage): SessionEvent {
    const schema = this.schemas[message.type];
    if (!schema) {
      throw new CodecError('REPSYNC_E701', `No payload schema registered for ${message.type}`, {
        messageId: message.id,
        type: message.type,
      });
    }

    const result = schema.safeParse(message.payload);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
        .join('; ');
      throw new CodecError('REPSYNC_E701', `Invalid ${message.type} payload: ${issues}`, {
        messageId: message.id,
        type: message.type,
      });
    }
    return result.data;
  }

  /**
   * Decode and apply one message. Decode failures are logged and dropped.
   *
   * @returns whether the store changed
   */
  handle(message: ProtocolMessage): boolean {
    let event: SessionEvent;
    try {
      event = this.decode(message);
    } catch (error) {
      this.logger.warn('Dropped undecodable message', {
        messageId: message.id,
        type: message.type,
        reason: toError(error).message,
      });
      return false;
    }

    return this.dispatch(event, message);
  }

  /**
   * Feed every envelope from `source` through {@link handle}
   */
  attach(source: Observable<ProtocolMessage>): Subscription {
    return source.subscribe({
      next: (message) => {
        this.handle(message);
      },
      error: (error: unknown) => {
        this.logger.error('Message stream failed', toError(error));
      },
    });
  }

  /**
   * Wrap a command in a fresh envelope (new id, current time)
   */
  encode(command: SessionCommand, options: EncodeOptions = {}): ProtocolMessage {
    const type: MessageType = command.type;
    return createProtocolMessage({
      type,
      payload: commandToPayload(command),
      sessionId: options.sessionId,
      version: options.version ?? this.store.version,
      correlationId: options.correlationId,
    });
  }

  private dispatch(event: SessionEvent, message: ProtocolMessage): boolean {
    const store = this.store;

    switch (event.type) {
      case 'session_sync':
        return store.applySync(event.state);
      case 'sync_response':
        return store.applySyncResponse(event.session, event.state);
      case 'session_join':
        return event.accountId !== undefined && store.applyParticipantJoined(event.accountId);
      case 'participant_join':
        return store.applyParticipantJoined(event.accountId, event.color);
      case 'session_leave':
      case 'participant_leave':
        return store.applyParticipantLeft(event.accountId);
      case 'session_update':
        return store.applySessionUpdated(event.patch);
      case 'exercise_add':
        return store.applyExerciseAdded(event.exercise);
      case 'exercise_update':
        return store.applyExerciseUpdated(event.exerciseId, event.patch);
      case 'exercise_delete':
        return store.applyExerciseDeleted(event.exerciseId);
      case 'set_add':
        return store.applySetAdded(event.exerciseId, event.set);
      case 'set_update':
        return store.applySetUpdated(event.exerciseId, event.setId, event.patch);
      case 'set_delete':
        return store.applySetDeleted(event.exerciseId, event.setId);
      case 'set_complete':
        return store.applySetCompleted(event.exerciseId, event.setId, event.complete);
      case 'set_reorder':
        return store.applySetReordered(event.exerciseId, event.fromSetId, event.toSetId);
      case 'cursor_move':
        return store.applyCursorMoved(event.accountId, event.cursor);
      case 'sync_request':
        this.syncRequestsSubject.next(message);
        return false;
      case 'error':
        this.logger.warn('Server reported an error', { message: event.message, code: event.code });
        this.serverErrorsSubject.next(
          new ServerError(event.message, {
            messageId: message.id,
            ...(event.code !== undefined ? { serverCode: event.code } : {}),
          })
        );
        return false;
    }
  }
}
