/**
 * Payload schemas for the exercise session protocol.
 *
 * The wire uses snake_case keys; every schema transforms into the
 * camelCase domain types from `types.ts`. Unknown keys are stripped.
 *
 * @module schemas
 */

import { tryParseIsoTimestamp } from '@repsync/core';
import type { MessagePayload, MessageType } from '@repsync/realtime';
import { z } from 'zod';
import {
  DISTANCE_UNITS,
  EXERCISE_ITEM_TYPES,
  EXERCISE_TYPES,
  SESSION_STATUSES,
  SET_TYPES,
  WEIGHT_UNITS,
  type ExerciseItem,
  type ExerciseMeta,
  type ExercisePatch,
  type ExerciseSet,
  type NewExercise,
  type ParticipantCursor,
  type SessionDocument,
  type SessionPatch,
  type SessionState,
  type SetMetrics,
  type SetPatch,
} from './types.js';

const isoDate = z.string().transform((value, ctx) => {
  const date = tryParseIsoTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unable to decode date: ${value}` });
    return z.NEVER;
  }
  return date;
});

// ── Documents ───────────────────────────────────────────────

export const setMetricsSchema = z
  .object({
    reps: z.number().int().nonnegative().nullish(),
    weight: z.object({ value: z.number(), unit: z.enum(WEIGHT_UNITS) }).nullish(),
    distance: z.object({ value: z.number(), unit: z.enum(DISTANCE_UNITS).default('m') }).nullish(),
    duration: z.object({ value: z.number().int().nonnegative() }).nullish(),
  })
  .transform(
    (wire): SetMetrics => ({
      reps: wire.reps ?? undefined,
      weight: wire.weight ?? undefined,
      distance: wire.distance ?? undefined,
      duration: wire.duration ?? undefined,
    })
  );

export const exerciseMetaSchema = z
  .object({
    internal_id: z.string().min(1),
    name: z.string(),
    type: z.enum(EXERCISE_TYPES),
  })
  .transform(
    (wire): ExerciseMeta => ({ internalId: wire.internal_id, name: wire.name, metricType: wire.type })
  );

export const exerciseSetSchema = z
  .object({
    id: z.string().min(1),
    meta_id: z.string().nullish(),
    order: z.number().int(),
    type: z.enum(SET_TYPES).default('working'),
    complete: z.boolean().default(false),
    metrics: setMetricsSchema.default({}),
  })
  .transform(
    (wire): ExerciseSet => ({
      id: wire.id,
      metaId: wire.meta_id ?? undefined,
      order: wire.order,
      type: wire.type,
      complete: wire.complete,
      metrics: wire.metrics,
    })
  );

export const exerciseItemSchema = z
  .object({
    id: z.string().min(1),
    order: z.number().int(),
    participants: z.array(z.string()).default([]),
    type: z.enum(EXERCISE_ITEM_TYPES).default('single'),
    rest: z.number().nonnegative().nullish(),
    meta: z.array(exerciseMetaSchema).default([]),
    sets: z.array(exerciseSetSchema).default([]),
  })
  .transform(
    (wire): ExerciseItem => ({
      id: wire.id,
      order: wire.order,
      participants: wire.participants,
      type: wire.type,
      rest: wire.rest ?? undefined,
      meta: wire.meta,
      sets: wire.sets,
    })
  );

export const sessionStateSchema = z
  .object({
    session_id: z.string().min(1),
    account_id: z.string(),
    version: z.number().int().nonnegative().default(0),
    items: z.array(exerciseItemSchema).default([]),
  })
  .transform(
    (wire): SessionState => ({
      sessionId: wire.session_id,
      accountId: wire.account_id,
      version: wire.version,
      items: wire.items,
    })
  );

const cursorSchema = z
  .object({ exercise_id: z.string(), exercise_set_id: z.string() })
  .transform((wire): ParticipantCursor => ({ exerciseId: wire.exercise_id, setId: wire.exercise_set_id }));

export const sessionDocumentSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().nullish(),
    status: z.enum(SESSION_STATUSES),
    owner_id: z.string(),
    created_at: isoDate,
    updated_at: isoDate,
    participants: z
      .array(z.object({ id: z.string(), color: z.string(), cursor: cursorSchema.nullish() }))
      .default([]),
    invitations: z
      .array(z.object({ invited_by: z.string(), invited: z.string(), expires: isoDate.nullish() }))
      .default([]),
  })
  .transform(
    (wire): SessionDocument => ({
      id: wire.id,
      name: wire.name ?? null,
      status: wire.status,
      ownerId: wire.owner_id,
      participants: wire.participants.map((p) => ({ id: p.id, color: p.color, cursor: p.cursor ?? undefined })),
      invitations: wire.invitations.map((i) => ({
        invitedBy: i.invited_by,
        invited: i.invited,
        expires: i.expires ?? undefined,
      })),
      createdAt: wire.created_at,
      updatedAt: wire.updated_at,
    })
  );

// ── Inbound events ──────────────────────────────────────────

/**
 * Typed view of an inbound message payload, discriminated by message type
 */
export type SessionEvent =
  | { readonly type: 'session_join'; readonly sessionId: string; readonly accountId?: string }
  | { readonly type: 'session_leave'; readonly sessionId?: string; readonly accountId: string }
  | { readonly type: 'session_update'; readonly patch: SessionPatch }
  | { readonly type: 'session_sync'; readonly state: SessionState }
  | { readonly type: 'sync_request' }
  | { readonly type: 'sync_response'; readonly session: SessionDocument; readonly state: SessionState }
  | { readonly type: 'participant_join'; readonly accountId: string; readonly color?: string }
  | { readonly type: 'participant_leave'; readonly accountId: string }
  | { readonly type: 'exercise_add'; readonly exercise: NewExercise }
  | { readonly type: 'exercise_update'; readonly exerciseId: string; readonly patch: ExercisePatch }
  | { readonly type: 'exercise_delete'; readonly exerciseId: string }
  | { readonly type: 'set_add'; readonly exerciseId: string; readonly set: ExerciseSet }
  | { readonly type: 'set_update'; readonly exerciseId: string; readonly setId: string; readonly patch: SetPatch }
  | { readonly type: 'set_delete'; readonly exerciseId: string; readonly setId: string }
  | { readonly type: 'set_complete'; readonly exerciseId: string; readonly setId: string; readonly complete: boolean }
  | {
      readonly type: 'set_reorder';
      readonly exerciseId: string;
      readonly fromSetId: string;
      readonly toSetId: string;
    }
  | { readonly type: 'cursor_move'; readonly accountId: string; readonly cursor: ParticipantCursor | null }
  | { readonly type: 'error'; readonly message: string; readonly code?: string };

export type SessionEventSchema = z.ZodType<SessionEvent, z.ZodTypeDef, unknown>;

export type SessionPayloadSchemas = Readonly<Partial<Record<MessageType, SessionEventSchema>>>;

export const SESSION_PAYLOAD_SCHEMAS = {
  session_join: z
    .object({ session_id: z.string().min(1), account_id: z.string().nullish() })
    .transform((p): SessionEvent => ({
      type: 'session_join',
      sessionId: p.session_id,
      accountId: p.account_id ?? undefined,
    })),

  session_leave: z
    .object({ session_id: z.string().nullish(), account_id: z.string().min(1) })
    .transform((p): SessionEvent => ({
      type: 'session_leave',
      sessionId: p.session_id ?? undefined,
      accountId: p.account_id,
    })),

  session_update: z
    .object({ status: z.enum(SESSION_STATUSES).optional(), name: z.string().nullable().optional() })
    .transform((p): SessionEvent => ({
      type: 'session_update',
      patch: { status: p.status, name: p.name },
    })),

  session_sync: z
    .object({ state: sessionStateSchema })
    .transform((p): SessionEvent => ({ type: 'session_sync', state: p.state })),

  sync_request: z.object({}).transform((): SessionEvent => ({ type: 'sync_request' })),

  sync_response: z
    .object({ session: sessionDocumentSchema, state: sessionStateSchema })
    .transform((p): SessionEvent => ({ type: 'sync_response', session: p.session, state: p.state })),

  participant_join: z
    .object({ account_id: z.string().min(1), color: z.string().nullish() })
    .transform((p): SessionEvent => ({
      type: 'participant_join',
      accountId: p.account_id,
      color: p.color ?? undefined,
    })),

  participant_leave: z
    .object({ account_id: z.string().min(1) })
    .transform((p): SessionEvent => ({ type: 'participant_leave', accountId: p.account_id })),

  exercise_add: z
    .object({
      exercise: z.object({
        id: z.string().min(1),
        type: z.enum(EXERCISE_ITEM_TYPES).default('single'),
        rest: z.number().nonnegative().nullish(),
        meta: z.array(exerciseMetaSchema).default([]),
        participants: z.array(z.string()).nullish(),
      }),
    })
    .transform((p): SessionEvent => ({
      type: 'exercise_add',
      exercise: {
        id: p.exercise.id,
        type: p.exercise.type,
        rest: p.exercise.rest ?? undefined,
        meta: p.exercise.meta,
        participants: p.exercise.participants ?? undefined,
      },
    })),

  exercise_update: z
    .object({
      exercise_id: z.string().min(1),
      order: z.number().int().optional(),
      participants: z.array(z.string()).optional(),
      type: z.enum(EXERCISE_ITEM_TYPES).optional(),
      rest: z.number().nonnegative().optional(),
      meta: z.array(exerciseMetaSchema).optional(),
    })
    .transform((p): SessionEvent => ({
      type: 'exercise_update',
      exerciseId: p.exercise_id,
      patch: {
        order: p.order,
        participants: p.participants,
        type: p.type,
        rest: p.rest,
        meta: p.meta,
      },
    })),

  exercise_delete: z
    .object({ exercise_id: z.string().min(1) })
    .transform((p): SessionEvent => ({ type: 'exercise_delete', exerciseId: p.exercise_id })),

  set_add: z
    .object({ exercise_id: z.string().min(1), set: exerciseSetSchema })
    .transform((p): SessionEvent => ({ type: 'set_add', exerciseId: p.exercise_id, set: p.set })),

  set_update: z
    .object({
      exercise_id: z.string().min(1),
      set_id: z.string().min(1),
      meta_id: z.string().optional(),
      type: z.enum(SET_TYPES).optional(),
      complete: z.boolean().optional(),
      metrics: setMetricsSchema.optional(),
    })
    .transform((p): SessionEvent => ({
      type: 'set_update',
      exerciseId: p.exercise_id,
      setId: p.set_id,
      patch: { metaId: p.meta_id, type: p.type, complete: p.complete, metrics: p.metrics },
    })),

  set_delete: z
    .object({ exercise_id: z.string().min(1), set_id: z.string().min(1) })
    .transform((p): SessionEvent => ({ type: 'set_delete', exerciseId: p.exercise_id, setId: p.set_id })),

  set_complete: z
    .object({ exercise_id: z.string().min(1), set_id: z.string().min(1), complete: z.boolean().default(true) })
    .transform((p): SessionEvent => ({
      type: 'set_complete',
      exerciseId: p.exercise_id,
      setId: p.set_id,
      complete: p.complete,
    })),

  set_reorder: z
    .object({ exercise_id: z.string().min(1), from_set_id: z.string().min(1), to_set_id: z.string().min(1) })
    .transform((p): SessionEvent => ({
      type: 'set_reorder',
      exerciseId: p.exercise_id,
      fromSetId: p.from_set_id,
      toSetId: p.to_set_id,
    })),

  cursor_move: z
    .object({ account_id: z.string().min(1), cursor: cursorSchema.nullable() })
    .transform((p): SessionEvent => ({ type: 'cursor_move', accountId: p.account_id, cursor: p.cursor })),

  error: z
    .object({ message: z.string(), code: z.string().nullish() })
    .transform((p): SessionEvent => ({ type: 'error', message: p.message, code: p.code ?? undefined })),
} satisfies Record<MessageType, SessionEventSchema>;

// ── Outbound commands ───────────────────────────────────────

/**
 * Local mutations announced to the server
 */
export type SessionCommand =
  | { readonly type: 'session_join'; readonly sessionId: string }
  | { readonly type: 'session_leave'; readonly sessionId: string; readonly accountId: string }
  | { readonly type: 'session_update'; readonly patch: SessionPatch }
  | { readonly type: 'sync_request' }
  | { readonly type: 'exercise_add'; readonly exercise: NewExercise }
  | { readonly type: 'exercise_update'; readonly exerciseId: string; readonly patch: ExercisePatch }
  | { readonly type: 'exercise_delete'; readonly exerciseId: string }
  | { readonly type: 'set_add'; readonly exerciseId: string; readonly set: ExerciseSet }
  | { readonly type: 'set_update'; readonly exerciseId: string; readonly setId: string; readonly patch: SetPatch }
  | { readonly type: 'set_delete'; readonly exerciseId: string; readonly setId: string }
  | { readonly type: 'set_complete'; readonly exerciseId: string; readonly setId: string; readonly complete: boolean }
  | {
      readonly type: 'set_reorder';
      readonly exerciseId: string;
      readonly fromSetId: string;
      readonly toSetId: string;
    }
  | { readonly type: 'cursor_move'; readonly accountId: string; readonly cursor: ParticipantCursor | null };

function metaToWire(meta: readonly ExerciseMeta[]): MessagePayload[] {
  return meta.map((m) => ({ internal_id: m.internalId, name: m.name, type: m.metricType }));
}

function setToWire(set: ExerciseSet): MessagePayload {
  return {
    id: set.id,
    meta_id: set.metaId,
    order: set.order,
    type: set.type,
    complete: set.complete,
    metrics: set.metrics,
  };
}

/**
 * Build the wire payload for a command. Undefined fields are left in
 * place; JSON encoding omits them.
 */
export function commandToPayload(command: SessionCommand): MessagePayload {
  switch (command.type) {
    case 'session_join':
      return { session_id: command.sessionId };
    case 'session_leave':
      return { session_id: command.sessionId, account_id: command.accountId };
    case 'session_update':
      return { status: command.patch.status, name: command.patch.name };
    case 'sync_request':
      return {};
    case 'exercise_add':
      return {
        exercise: {
          id: command.exercise.id,
          type: command.exercise.type,
          rest: command.exercise.rest,
          meta: metaToWire(command.exercise.meta),
          participants: command.exercise.participants,
        },
      };
    case 'exercise_update':
      return {
        exercise_id: command.exerciseId,
        order: command.patch.order,
        participants: command.patch.participants,
        type: command.patch.type,
        rest: command.patch.rest,
        meta: command.patch.meta ? metaToWire(command.patch.meta) : undefined,
      };
    case 'exercise_delete':
      return { exercise_id: command.exerciseId };
    case 'set_add':
      return { exercise_id: command.exerciseId, set: setToWire(command.set) };
    case 'set_update':
      return {
        exercise_id: command.exerciseId,
        set_id: command.setId,
        meta_id: command.patch.metaId,
        type: command.patch.type,
        complete: command.patch.complete,
        metrics: command.patch.metrics,
      };
    case 'set_delete':
      return { exercise_id: command.exerciseId, set_id: command.setId };
    case 'set_complete':
      return { exercise_id: command.exerciseId, set_id: command.setId, complete: command.complete };
    case 'set_reorder':
      return {
        exercise_id: command.exerciseId,
        from_set_id: command.fromSetId,
        to_set_id: command.toSetId,
      };
    case 'cursor_move':
      return {
        account_id: command.accountId,
        cursor: command.cursor
          ? { exercise_id: command.cursor.exerciseId, exercise_set_id: command.cursor.setId }
          : null,
      };
  }
}
