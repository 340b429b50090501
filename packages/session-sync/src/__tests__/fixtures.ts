import type {
  ExerciseItem,
  ExerciseMeta,
  ExerciseSet,
  SessionDocument,
  SessionState,
} from '../types.js';

export const BENCH_META: ExerciseMeta = { internalId: 'bench-press', name: 'Bench Press', metricType: 'weight_reps' };

export function makeSet(id: string, order: number, overrides: Partial<ExerciseSet> = {}): ExerciseSet {
  return {
    id,
    metaId: BENCH_META.internalId,
    order,
    type: 'working',
    complete: false,
    metrics: { reps: 8, weight: { value: 60, unit: 'kg' } },
    ...overrides,
  };
}

export function makeExercise(
  id: string,
  sets: readonly ExerciseSet[],
  overrides: Partial<ExerciseItem> = {}
): ExerciseItem {
  return {
    id,
    order: 1,
    participants: ['athlete-1'],
    type: 'single',
    meta: [BENCH_META],
    sets,
    ...overrides,
  };
}

export function makeState(items: readonly ExerciseItem[], version = 0): SessionState {
  return { sessionId: 'session-1', accountId: 'athlete-1', version, items };
}

export function makeSession(overrides: Partial<SessionDocument> = {}): SessionDocument {
  return {
    id: 'session-1',
    name: 'Push day',
    status: 'active',
    ownerId: 'athlete-1',
    participants: [{ id: 'athlete-1', color: '#FF6B6B' }],
    invitations: [],
    createdAt: new Date('2024-03-01T09:00:00.000Z'),
    updatedAt: new Date('2024-03-01T09:00:00.000Z'),
    ...overrides,
  };
}
