/**
 * SessionStateStore - the single in-process copy of a session.
 *
 * Snapshots are replaced, never mutated. Three sources write to the store:
 *
 * 1. Full syncs from the server replace {@link SessionState} wholesale.
 * 2. Discrete server events touch only the entity they address.
 * 3. Local optimistic mutations apply immediately and bump `version`.
 *    The next full sync corrects any divergence.
 *
 * Writes happen synchronously in arrival order on the event loop, and
 * subscribers are notified only after the new snapshot is in place.
 *
 * @module session-state-store
 */

import { createLogger, type Logger } from '@repsync/core';
import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import { participantColor } from './participant-colors.js';
import type {
  ExerciseItem,
  ExercisePatch,
  ExerciseSet,
  NewExercise,
  ParticipantCursor,
  SessionDocument,
  SessionParticipant,
  SessionPatch,
  SessionState,
  SetMetrics,
  SetPatch,
} from './types.js';

export type SessionChangeSource = 'sync' | 'remote' | 'local';

export interface SessionChange {
  readonly source: SessionChangeSource;
  /** Operation that produced the change, e.g. `set_complete` */
  readonly kind: string;
  /** `SessionState.version` after the change, 0 without a state */
  readonly version: number;
}

/** A set as created locally; `order` is assigned by the store */
export type NewExerciseSet = Omit<ExerciseSet, 'order'>;

export interface OfflineSessionInit {
  ownerId: string;
  name?: string | null;
  sessionId?: string;
  createdAt?: Date;
}

export interface SessionStateStoreOptions {
  logger?: Logger;
}

type StateRecipe = (state: SessionState) => SessionState | null;
type DocumentRecipe = (session: SessionDocument) => SessionDocument | null;
type ItemRecipe = (item: ExerciseItem) => ExerciseItem | null;
type SetRecipe = (set: ExerciseSet) => ExerciseSet | null;

function updateItem(state: SessionState, exerciseId: string, recipe: ItemRecipe): SessionState | null {
  const index = state.items.findIndex((item) => item.id === exerciseId);
  const item = state.items[index];
  if (!item) return null;

  const next = recipe(item);
  if (!next) return null;

  const items = [...state.items];
  items[index] = next;
  return { ...state, items };
}

function updateSet(
  state: SessionState,
  exerciseId: string,
  setId: string,
  recipe: SetRecipe
): SessionState | null {
  return updateItem(state, exerciseId, (item) => {
    const index = item.sets.findIndex((set) => set.id === setId);
    const set = item.sets[index];
    if (!set) return null;

    const next = recipe(set);
    if (!next) return null;

    const sets = [...item.sets];
    sets[index] = next;
    return { ...item, sets };
  });
}

/** Exchange the positions of two sets */
function swapSets(item: ExerciseItem, fromSetId: string, toSetId: string): ExerciseItem | null {
  if (fromSetId === toSetId) return null;

  const fromIndex = item.sets.findIndex((set) => set.id === fromSetId);
  const toIndex = item.sets.findIndex((set) => set.id === toSetId);
  const from = item.sets[fromIndex];
  const to = item.sets[toIndex];
  if (!from || !to) return null;

  const sets = [...item.sets];
  sets[fromIndex] = to;
  sets[toIndex] = from;
  return { ...item, sets };
}

function renumbered(item: ExerciseItem): ExerciseItem | null {
  if (item.sets.every((set, index) => set.order === index + 1)) return null;
  return { ...item, sets: item.sets.map((set, index) => ({ ...set, order: index + 1 })) };
}

function sameCursor(a: ParticipantCursor | undefined, b: ParticipantCursor | null): boolean {
  if (!a || !b) return !a && !b;
  return a.exerciseId === b.exerciseId && a.setId === b.setId;
}

/**
 * Holds the live SessionDocument and SessionState.
 *
 * Every mutating method returns `true` when it changed something.
 *
 * @example
 * ```typescript
 * const store = new SessionStateStore();
 * store.state$.subscribe((state) => render(state));
 *
 * store.applySync(serverState);
 * store.toggleSetComplete('bench', 's1'); // version + 1
 * ```
 */
export class SessionStateStore {
  private readonly logger: Logger;
  private readonly sessionSubject = new BehaviorSubject<SessionDocument | null>(null);
  private readonly stateSubject = new BehaviorSubject<SessionState | null>(null);
  private readonly changesSubject = new Subject<SessionChange>();

  constructor(options: SessionStateStoreOptions = {}) {
    this.logger = options.logger ?? createLogger({ module: 'session-store' });
  }

  // ── Reads ─────────────────────────────────────────────────

  get session$(): Observable<SessionDocument | null> {
    return this.sessionSubject.asObservable();
  }

  get state$(): Observable<SessionState | null> {
    return this.stateSubject.asObservable();
  }

  get changes$(): Observable<SessionChange> {
    return this.changesSubject.asObservable();
  }

  get session(): SessionDocument | null {
    return this.sessionSubject.getValue();
  }

  get state(): SessionState | null {
    return this.stateSubject.getValue();
  }

  get version(): number {
    return this.state?.version ?? 0;
  }

  getExercise(exerciseId: string): ExerciseItem | undefined {
    return this.state?.items.find((item) => item.id === exerciseId);
  }

  getSet(exerciseId: string, setId: string): ExerciseSet | undefined {
    return this.getExercise(exerciseId)?.sets.find((set) => set.id === setId);
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Install a session fetched or joined from the server
   */
  loadSession(session: SessionDocument, state: SessionState | null = null): void {
    this.sessionSubject.next(session);
    this.stateSubject.next(state);
    this.notify('sync', 'load');
  }

  /**
   * Synthesize a draft session that exists only on this device
   */
  createOfflineSession(init: OfflineSessionInit): SessionDocument {
    const now = init.createdAt ?? new Date();
    const sessionId = init.sessionId ?? `offline-${now.getTime()}`;

    const session: SessionDocument = {
      id: sessionId,
      name: init.name ?? null,
      status: 'draft',
      ownerId: init.ownerId,
      participants: [{ id: init.ownerId, color: participantColor(init.ownerId) }],
      invitations: [],
      createdAt: now,
      updatedAt: now,
    };

    this.loadSession(session, { sessionId, accountId: init.ownerId, version: 0, items: [] });
    this.logger.debug('Created offline session', { sessionId });
    return session;
  }

  /** Drop the session, e.g. on leave or sign-out */
  clear(): void {
    if (!this.session && !this.state) return;
    this.sessionSubject.next(null);
    this.stateSubject.next(null);
    this.notify('local', 'clear');
  }

  // ── Full syncs ────────────────────────────────────────────

  /**
   * Replace the whole state. The last sync wins over any local mutation.
   */
  applySync(state: SessionState): boolean {
    this.stateSubject.next(state);
    this.notify('sync', 'session_sync');
    return true;
  }

  applySyncResponse(session: SessionDocument, state: SessionState): boolean {
    this.sessionSubject.next(session);
    this.stateSubject.next(state);
    this.notify('sync', 'sync_response');
    return true;
  }

  // ── Discrete server events ────────────────────────────────

  /** No-op when the participant is already present */
  applyParticipantJoined(accountId: string, color?: string): boolean {
    return this.updateSession('remote', 'participant_join', (session) => {
      if (session.participants.some((p) => p.id === accountId)) return null;
      const participant: SessionParticipant = { id: accountId, color: color ?? participantColor(accountId) };
      return { ...session, participants: [...session.participants, participant] };
    });
  }

  /** No-op when the participant is absent */
  applyParticipantLeft(accountId: string): boolean {
    return this.updateSession('remote', 'participant_leave', (session) => {
      const participants = session.participants.filter((p) => p.id !== accountId);
      return participants.length === session.participants.length ? null : { ...session, participants };
    });
  }

  applyCursorMoved(accountId: string, cursor: ParticipantCursor | null): boolean {
    return this.updateSession('remote', 'cursor_move', (session) => {
      const index = session.participants.findIndex((p) => p.id === accountId);
      const participant = session.participants[index];
      if (!participant || sameCursor(participant.cursor, cursor)) return null;

      const participants = [...session.participants];
      participants[index] = cursor ? { ...participant, cursor } : { id: participant.id, color: participant.color };
      return { ...session, participants };
    });
  }

  applySessionUpdated(patch: SessionPatch): boolean {
    return this.updateSession('remote', 'session_update', (session) => {
      const status = patch.status ?? session.status;
      const name = patch.name === undefined ? session.name : patch.name;
      if (status === session.status && name === session.name) return null;
      return { ...session, status, name };
    });
  }

  applyExerciseAdded(exercise: NewExercise): boolean {
    return this.appendExercise('remote', exercise);
  }

  applyExerciseUpdated(exerciseId: string, patch: ExercisePatch): boolean {
    return this.updateState('remote', 'exercise_update', (state) =>
      updateItem(state, exerciseId, (item) => ({
        ...item,
        order: patch.order ?? item.order,
        participants: patch.participants ?? item.participants,
        type: patch.type ?? item.type,
        rest: patch.rest ?? item.rest,
        meta: patch.meta ?? item.meta,
      }))
    );
  }

  applyExerciseDeleted(exerciseId: string): boolean {
    return this.removeExercise('remote', exerciseId);
  }

  applySetAdded(exerciseId: string, set: ExerciseSet): boolean {
    return this.updateState('remote', 'set_add', (state) =>
      updateItem(state, exerciseId, (item) =>
        item.sets.some((existing) => existing.id === set.id) ? null : { ...item, sets: [...item.sets, set] }
      )
    );
  }

  applySetUpdated(exerciseId: string, setId: string, patch: SetPatch): boolean {
    return this.updateState('remote', 'set_update', (state) =>
      updateSet(state, exerciseId, setId, (set) => ({
        ...set,
        metaId: patch.metaId ?? set.metaId,
        type: patch.type ?? set.type,
        complete: patch.complete ?? set.complete,
        metrics: patch.metrics ?? set.metrics,
      }))
    );
  }

  applySetDeleted(exerciseId: string, setId: string): boolean {
    return this.removeSet('remote', exerciseId, setId);
  }

  applySetCompleted(exerciseId: string, setId: string, complete = true): boolean {
    return this.updateState('remote', 'set_complete', (state) =>
      updateSet(state, exerciseId, setId, (set) => (set.complete === complete ? null : { ...set, complete }))
    );
  }

  applySetReordered(exerciseId: string, fromSetId: string, toSetId: string): boolean {
    return this.updateState('remote', 'set_reorder', (state) =>
      updateItem(state, exerciseId, (item) => swapSets(item, fromSetId, toSetId))
    );
  }

  // ── Local optimistic mutations ────────────────────────────

  /** Flip `complete`. Applying it twice restores the original value. */
  toggleSetComplete(exerciseId: string, setId: string): boolean {
    return this.updateState('local', 'set_complete', (state) =>
      updateSet(state, exerciseId, setId, (set) => ({ ...set, complete: !set.complete }))
    );
  }

  /**
   * Swap the sets at `fromSetId`'s and `toSetId`'s positions, so a second
   * call with the ids reversed restores the original order.
   *
   * `order` fields are left alone unless `renumber` is set, in which case
   * the exercise is renumbered within the same change (one `version` bump).
   */
  reorderSet(
    exerciseId: string,
    fromSetId: string,
    toSetId: string,
    options: { renumber?: boolean } = {}
  ): boolean {
    return this.updateState('local', 'set_reorder', (state) =>
      updateItem(state, exerciseId, (item) => {
        const swapped = swapSets(item, fromSetId, toSetId);
        if (!swapped || !options.renumber) return swapped;
        return renumbered(swapped) ?? swapped;
      })
    );
  }

  /** Reassign `order` as 1..N by position */
  renumberSets(exerciseId: string): boolean {
    return this.updateState('local', 'set_renumber', (state) => updateItem(state, exerciseId, renumbered));
  }

  /**
   * Replace the metrics record wholesale. Always counts as a change while
   * the set exists, so a re-entered value is still sent.
   */
  updateMetrics(exerciseId: string, setId: string, metrics: SetMetrics): boolean {
    return this.updateState('local', 'set_update', (state) =>
      updateSet(state, exerciseId, setId, (set) => ({ ...set, metrics }))
    );
  }

  /** Appends with `order = items.length + 1`. Ids are not deduplicated. */
  addExercise(exercise: NewExercise): boolean {
    return this.appendExercise('local', exercise);
  }

  addSet(exerciseId: string, set: NewExerciseSet): boolean {
    return this.updateState('local', 'set_add', (state) =>
      updateItem(state, exerciseId, (item) => ({
        ...item,
        sets: [...item.sets, { ...set, order: item.sets.length + 1 }],
      }))
    );
  }

  deleteSet(exerciseId: string, setId: string): boolean {
    return this.removeSet('local', exerciseId, setId);
  }

  deleteExercise(exerciseId: string): boolean {
    return this.removeExercise('local', exerciseId);
  }

  // ── Internals ─────────────────────────────────────────────

  private appendExercise(source: SessionChangeSource, exercise: NewExercise): boolean {
    return this.updateState(source, 'exercise_add', (state) => {
      const item: ExerciseItem = {
        id: exercise.id,
        order: state.items.length + 1,
        participants: exercise.participants ?? [],
        type: exercise.type,
        rest: exercise.rest,
        meta: exercise.meta,
        sets: [],
      };
      return { ...state, items: [...state.items, item] };
    });
  }

  private removeExercise(source: SessionChangeSource, exerciseId: string): boolean {
    return this.updateState(source, 'exercise_delete', (state) => {
      const items = state.items.filter((item) => item.id !== exerciseId);
      return items.length === state.items.length ? null : { ...state, items };
    });
  }

  private removeSet(source: SessionChangeSource, exerciseId: string, setId: string): boolean {
    return this.updateState(source, 'set_delete', (state) =>
      updateItem(state, exerciseId, (item) => {
        const sets = item.sets.filter((set) => set.id !== setId);
        return sets.length === item.sets.length ? null : { ...item, sets };
      })
    );
  }

  private updateState(source: SessionChangeSource, kind: string, recipe: StateRecipe): boolean {
    const current = this.state;
    if (!current) {
      this.logger.debug('Ignored change without a session state', { source, kind });
      return false;
    }

    const next = recipe(current);
    if (!next) return false;

    this.stateSubject.next({ ...next, version: current.version + 1 });
    this.notify(source, kind);
    return true;
  }

  private updateSession(source: SessionChangeSource, kind: string, recipe: DocumentRecipe): boolean {
    const current = this.session;
    if (!current) {
      this.logger.debug('Ignored change without a session', { source, kind });
      return false;
    }

    const next = recipe(current);
    if (!next) return false;

    this.sessionSubject.next(next);
    this.notify(source, kind);
    return true;
  }

  private notify(source: SessionChangeSource, kind: string): void {
    this.changesSubject.next({ source, kind, version: this.version });
  }
}
