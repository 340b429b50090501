/**
 * Domain types for collaborative exercise sessions.
 *
 * Snapshots are immutable: every change produces a new object, so a
 * reader holding a snapshot never sees a partial update.
 */

export const EXERCISE_TYPES = [
  'weight_reps',
  'weight_time',
  'distance_time',
  'reps',
  'time',
  'distance',
] as const;
export type ExerciseType = (typeof EXERCISE_TYPES)[number];

export const SESSION_STATUSES = ['draft', 'active', 'complete'] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const EXERCISE_ITEM_TYPES = ['single', 'compound'] as const;
export type ExerciseItemType = (typeof EXERCISE_ITEM_TYPES)[number];

export const SET_TYPES = ['warmup', 'working', 'drop', 'super', 'failure'] as const;
export type ExerciseSetType = (typeof SET_TYPES)[number];

export const WEIGHT_UNITS = ['kg', 'lb'] as const;
export type WeightUnit = (typeof WEIGHT_UNITS)[number];

export const DISTANCE_UNITS = ['m', 'km', 'mi', 'yd'] as const;
export type DistanceUnit = (typeof DISTANCE_UNITS)[number];

export interface Weight {
  readonly value: number;
  readonly unit: WeightUnit;
}

export interface Distance {
  readonly value: number;
  readonly unit: DistanceUnit;
}

/** Whole seconds */
export interface Duration {
  readonly value: number;
}

export interface SetMetrics {
  readonly reps?: number;
  readonly weight?: Weight;
  readonly distance?: Distance;
  readonly duration?: Duration;
}

/** Where a participant is currently looking */
export interface ParticipantCursor {
  readonly exerciseId: string;
  readonly setId: string;
}

export interface SessionParticipant {
  /** Account id */
  readonly id: string;
  /** Hex color used for presence UI */
  readonly color: string;
  readonly cursor?: ParticipantCursor;
}

export interface SessionInvitation {
  readonly invitedBy: string;
  readonly invited: string;
  readonly expires?: Date;
}

export interface SessionDocument {
  readonly id: string;
  readonly name: string | null;
  readonly status: SessionStatus;
  readonly ownerId: string;
  /** Unique by id */
  readonly participants: readonly SessionParticipant[];
  readonly invitations: readonly SessionInvitation[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface ExerciseMeta {
  readonly internalId: string;
  readonly name: string;
  readonly metricType: ExerciseType;
}

export interface ExerciseSet {
  readonly id: string;
  /** `internalId` of the {@link ExerciseMeta} this set belongs to */
  readonly metaId?: string;
  readonly order: number;
  readonly type: ExerciseSetType;
  readonly complete: boolean;
  readonly metrics: SetMetrics;
}

export interface ExerciseItem {
  readonly id: string;
  readonly order: number;
  /** Account ids */
  readonly participants: readonly string[];
  readonly type: ExerciseItemType;
  /** Rest between sets, in seconds */
  readonly rest?: number;
  readonly meta: readonly ExerciseMeta[];
  readonly sets: readonly ExerciseSet[];
}

export interface SessionState {
  readonly sessionId: string;
  readonly accountId: string;
  readonly version: number;
  readonly items: readonly ExerciseItem[];
}

/** Exercise as announced by `exercise_add` */
export interface NewExercise {
  readonly id: string;
  readonly type: ExerciseItemType;
  readonly rest?: number;
  readonly meta: readonly ExerciseMeta[];
  readonly participants?: readonly string[];
}

export type ExercisePatch = Partial<Pick<ExerciseItem, 'order' | 'participants' | 'type' | 'rest' | 'meta'>>;

export type SetPatch = Partial<Pick<ExerciseSet, 'metaId' | 'type' | 'complete' | 'metrics'>>;

export interface SessionPatch {
  readonly status?: SessionStatus;
  readonly name?: string | null;
}
