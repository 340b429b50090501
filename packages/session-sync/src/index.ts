/**
 * @repsync/session-sync - collaborative exercise sessions on top of
 * `@repsync/realtime`
 *
 * @example
 * ```typescript
 * import { ExerciseSessionClient } from '@repsync/session-sync';
 *
 * const client = new ExerciseSessionClient({ baseUrl, accountId, credentials });
 * client.state$.subscribe(render);
 *
 * await client.start();
 * await client.joinSession(sessionId);
 * ```
 *
 * @packageDocumentation
 * @module @repsync/session-sync
 */

export * from './types.js';

export {
  SESSION_PAYLOAD_SCHEMAS,
  commandToPayload,
  exerciseItemSchema,
  exerciseMetaSchema,
  exerciseSetSchema,
  sessionDocumentSchema,
  sessionStateSchema,
  setMetricsSchema,
  type SessionCommand,
  type SessionEvent,
  type SessionEventSchema,
  type SessionPayloadSchemas,
} from './schemas.js';

export {
  SessionStateStore,
  type NewExerciseSet,
  type OfflineSessionInit,
  type SessionChange,
  type SessionChangeSource,
  type SessionStateStoreOptions,
} from './session-state-store.js';

export {
  SessionProtocolHandler,
  type EncodeOptions,
  type SessionProtocolHandlerOptions,
} from './session-protocol-handler.js';

export {
  EXERCISE_SESSION_CHANNEL,
  ExerciseSessionClient,
  type ExerciseSessionClientConfig,
} from './exercise-session-client.js';

// Helpers
export {
  getCompletionRatio,
  getMetaForSet,
  getNextIncompleteData,
  getNextIncompleteSet,
  getSortedExercises,
  getSortedSets,
  isExerciseComplete,
  type NextIncompleteData,
} from './session-helpers.js';
export {
  componentsToSeconds,
  distanceToMeters,
  formatDuration,
  secondsToComponents,
  weightToKg,
  weightToLb,
  type TimeComponents,
} from './units.js';
export { PARTICIPANT_COLORS, participantColor } from './participant-colors.js';
