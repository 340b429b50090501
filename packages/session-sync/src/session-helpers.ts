/**
 * Read-only queries over a session state snapshot.
 *
 * @module session-helpers
 */

import type { ExerciseItem, ExerciseMeta, ExerciseSet, SessionState } from './types.js';

export interface NextIncompleteData {
  readonly exercise: ExerciseItem;
  readonly set: ExerciseSet;
  readonly meta: ExerciseMeta;
}

/** Exercises sorted by `order` */
export function getSortedExercises(state: SessionState): ExerciseItem[] {
  return [...state.items].sort((a, b) => a.order - b.order);
}

/** Sets sorted by `order` */
export function getSortedSets(exercise: ExerciseItem): ExerciseSet[] {
  return [...exercise.sets].sort((a, b) => a.order - b.order);
}

/** An exercise without sets counts as complete */
export function isExerciseComplete(exercise: ExerciseItem): boolean {
  return exercise.sets.every((set) => set.complete);
}

export function getNextIncompleteSet(exercise: ExerciseItem): ExerciseSet | undefined {
  return getSortedSets(exercise).find((set) => !set.complete);
}

export function getMetaForSet(exercise: ExerciseItem, set: ExerciseSet): ExerciseMeta | undefined {
  if (set.metaId === undefined) return undefined;
  return exercise.meta.find((meta) => meta.internalId === set.metaId);
}

/**
 * First incomplete set of the first incomplete exercise, with its meta.
 * Returns `undefined` when everything is done or the set has no meta.
 */
export function getNextIncompleteData(state: SessionState): NextIncompleteData | undefined {
  for (const exercise of getSortedExercises(state)) {
    if (isExerciseComplete(exercise)) continue;

    const set = getNextIncompleteSet(exercise);
    if (!set) continue;

    const meta = getMetaForSet(exercise, set);
    return meta ? { exercise, set, meta } : undefined;
  }
  return undefined;
}

/** Fraction of completed sets, 0 when there are none */
export function getCompletionRatio(state: SessionState): number {
  const sets = state.items.flatMap((item) => item.sets);
  if (sets.length === 0) return 0;
  return sets.filter((set) => set.complete).length / sets.length;
}
