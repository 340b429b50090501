import { describe, expect, it } from 'vitest';
import { participantColor } from '../participant-colors.js';
import { SessionStateStore, type SessionChange } from '../session-state-store.js';
import type { SessionState } from '../types.js';
import { BENCH_META, makeExercise, makeSession, makeSet, makeState } from './fixtures.js';

const THREE_SETS = makeState([makeExercise('bench', [makeSet('s1', 1), makeSet('s2', 2), makeSet('s3', 3)])]);

function loadedStore(state: SessionState = THREE_SETS): SessionStateStore {
  const store = new SessionStateStore();
  store.loadSession(makeSession(), state);
  return store;
}

function setIds(store: SessionStateStore, exerciseId = 'bench'): string[] {
  return store.getExercise(exerciseId)?.sets.map((set) => set.id) ?? [];
}

describe('SessionStateStore', () => {
  describe('lifecycle', () => {
    it('should start empty', () => {
      const store = new SessionStateStore();
      expect(store.session).toBeNull();
      expect(store.state).toBeNull();
      expect(store.version).toBe(0);
    });

    it('should create an offline draft session owned by the account', () => {
      const store = new SessionStateStore();
      const createdAt = new Date('2024-03-01T09:00:00.000Z');

      const session = store.createOfflineSession({ ownerId: 'athlete-1', name: 'Legs', createdAt });

      expect(session).toEqual({
        id: `offline-${createdAt.getTime()}`,
        name: 'Legs',
        status: 'draft',
        ownerId: 'athlete-1',
        participants: [{ id: 'athlete-1', color: participantColor('athlete-1') }],
        invitations: [],
        createdAt,
        updatedAt: createdAt,
      });
      expect(store.state).toEqual({
        sessionId: `offline-${createdAt.getTime()}`,
        accountId: 'athlete-1',
        version: 0,
        items: [],
      });
    });

    it('should drop everything on clear', () => {
      const store = loadedStore();
      store.clear();
      expect(store.session).toBeNull();
      expect(store.state).toBeNull();
    });

    it('should ignore mutations without a loaded state', () => {
      const store = new SessionStateStore();
      expect(store.toggleSetComplete('bench', 's1')).toBe(false);
      expect(store.addExercise({ id: 'bench', type: 'single', meta: [] })).toBe(false);
      expect(store.applyParticipantJoined('athlete-2')).toBe(false);
    });
  });

  describe('toggleSetComplete', () => {
    it('should be its own inverse', () => {
      const store = loadedStore();

      expect(store.toggleSetComplete('bench', 's2')).toBe(true);
      expect(store.getSet('bench', 's2')?.complete).toBe(true);
      expect(store.toggleSetComplete('bench', 's2')).toBe(true);

      expect(store.getSet('bench', 's2')?.complete).toBe(false);
      expect(store.version).toBe(2);
    });

    it('should leave other sets untouched', () => {
      const store = loadedStore();
      const before = store.getExercise('bench');

      store.toggleSetComplete('bench', 's2');

      const after = store.getExercise('bench');
      expect(after?.sets[0]).toBe(before?.sets[0]);
      expect(after?.sets[2]).toBe(before?.sets[2]);
    });

    it('should do nothing for unknown ids', () => {
      const store = loadedStore();
      expect(store.toggleSetComplete('bench', 'missing')).toBe(false);
      expect(store.toggleSetComplete('missing', 's1')).toBe(false);
      expect(store.version).toBe(0);
    });

    it('should never mutate a published snapshot', () => {
      const store = loadedStore();
      const snapshot = store.state;

      store.toggleSetComplete('bench', 's1');

      expect(snapshot?.items[0]?.sets[0]?.complete).toBe(false);
      expect(store.state).not.toBe(snapshot);
    });
  });

  describe('reorderSet', () => {
    it('should swap the two sets without renumbering', () => {
      const store = loadedStore();

      expect(store.reorderSet('bench', 's1', 's3')).toBe(true);

      expect(setIds(store)).toEqual(['s3', 's2', 's1']);
      expect(store.getExercise('bench')?.sets.map((set) => set.order)).toEqual([3, 2, 1]);
    });

    it('should restore the original order when reversed for neighbouring sets', () => {
      const store = loadedStore();

      store.reorderSet('bench', 's1', 's2');
      expect(setIds(store)).toEqual(['s2', 's1', 's3']);
      store.reorderSet('bench', 's2', 's1');

      expect(setIds(store)).toEqual(['s1', 's2', 's3']);
    });

    it('should restore the original order when reversed for sets further apart', () => {
      const store = loadedStore(
        makeState([
          makeExercise('bench', [makeSet('s1', 1), makeSet('s2', 2), makeSet('s3', 3), makeSet('s4', 4)]),
        ])
      );

      store.reorderSet('bench', 's1', 's4');
      expect(setIds(store)).toEqual(['s4', 's2', 's3', 's1']);
      store.reorderSet('bench', 's4', 's1');

      expect(setIds(store)).toEqual(['s1', 's2', 's3', 's4']);
      expect(store.version).toBe(2);
    });

    it('should renumber within the same change when asked', () => {
      const store = loadedStore();

      expect(store.reorderSet('bench', 's1', 's3', { renumber: true })).toBe(true);

      expect(store.getExercise('bench')?.sets.map((set) => [set.id, set.order])).toEqual([
        ['s3', 1],
        ['s2', 2],
        ['s1', 3],
      ]);
      expect(store.version).toBe(1);
    });

    it('should do nothing for equal or unknown ids', () => {
      const store = loadedStore();
      expect(store.reorderSet('bench', 's1', 's1')).toBe(false);
      expect(store.reorderSet('bench', 's1', 'missing')).toBe(false);
      expect(store.reorderSet('missing', 's1', 's2')).toBe(false);
      expect(store.version).toBe(0);
    });
  });

  describe('renumberSets', () => {
    it('should assign 1..N by position', () => {
      const store = loadedStore();
      store.reorderSet('bench', 's3', 's1');

      expect(store.renumberSets('bench')).toBe(true);

      expect(store.getExercise('bench')?.sets.map((set) => [set.id, set.order])).toEqual([
        ['s3', 1],
        ['s2', 2],
        ['s1', 3],
      ]);
    });

    it('should report no change when orders already match', () => {
      expect(loadedStore().renumberSets('bench')).toBe(false);
    });
  });

  describe('updateMetrics', () => {
    it('should replace the metrics record wholesale', () => {
      const store = loadedStore();

      expect(store.updateMetrics('bench', 's1', { reps: 10 })).toBe(true);

      expect(store.getSet('bench', 's1')?.metrics).toEqual({ reps: 10 });
      expect(store.version).toBe(1);
    });

    it('should count identical metrics as a change', () => {
      const store = loadedStore();
      store.applySync({ ...THREE_SETS, version: 5 });

      expect(store.updateMetrics('bench', 's1', { weight: { unit: 'kg', value: 60 }, reps: 8 })).toBe(true);

      expect(store.getSet('bench', 's1')?.metrics).toEqual({ reps: 8, weight: { value: 60, unit: 'kg' } });
      expect(store.version).toBe(6);
    });

    it('should do nothing for an unknown set', () => {
      const store = loadedStore();
      expect(store.updateMetrics('bench', 'missing', { reps: 10 })).toBe(false);
      expect(store.version).toBe(0);
    });
  });

  describe('addExercise', () => {
    it('should append with the next order and no sets', () => {
      const store = loadedStore(makeState([]));

      store.addExercise({ id: 'bench', type: 'single', meta: [BENCH_META] });
      store.addExercise({ id: 'row', type: 'single', rest: 90, meta: [] });

      expect(store.state?.items).toEqual([
        { id: 'bench', order: 1, participants: [], type: 'single', rest: undefined, meta: [BENCH_META], sets: [] },
        { id: 'row', order: 2, participants: [], type: 'single', rest: 90, meta: [], sets: [] },
      ]);
    });

    it('should not deduplicate ids', () => {
      const store = loadedStore(makeState([]));
      store.addExercise({ id: 'bench', type: 'single', meta: [] });
      store.addExercise({ id: 'bench', type: 'single', meta: [] });
      expect(store.state?.items.map((item) => item.order)).toEqual([1, 2]);
    });
  });

  describe('sets', () => {
    it('should append a new set after the existing ones', () => {
      const store = loadedStore();

      store.addSet('bench', { id: 's4', type: 'drop', complete: false, metrics: { reps: 12 } });

      expect(store.getSet('bench', 's4')).toEqual({
        id: 's4',
        type: 'drop',
        complete: false,
        metrics: { reps: 12 },
        order: 4,
      });
    });

    it('should delete sets and exercises', () => {
      const store = loadedStore();

      expect(store.deleteSet('bench', 's2')).toBe(true);
      expect(setIds(store)).toEqual(['s1', 's3']);
      expect(store.deleteSet('bench', 's2')).toBe(false);

      expect(store.deleteExercise('bench')).toBe(true);
      expect(store.state?.items).toEqual([]);
      expect(store.version).toBe(2);
    });
  });

  describe('syncs', () => {
    it('should let the last sync win over local mutations', () => {
      const store = new SessionStateStore();

      store.applySync(makeState([makeExercise('bench', [makeSet('s1', 1)])], 5));
      store.toggleSetComplete('bench', 's1');
      expect(store.version).toBe(6);

      const authoritative = makeState([makeExercise('row', [])], 9);
      store.applySync(authoritative);

      expect(store.state).toBe(authoritative);
      expect(store.version).toBe(9);
    });

    it('should replace both documents on a sync response', () => {
      const store = loadedStore();
      const session = makeSession({ status: 'complete' });
      const state = makeState([], 3);

      store.applySyncResponse(session, state);

      expect(store.session).toBe(session);
      expect(store.state).toBe(state);
    });
  });

  describe('server events', () => {
    it('should add a joining participant with a deterministic color', () => {
      const store = loadedStore();

      expect(store.applyParticipantJoined('athlete-2')).toBe(true);

      expect(store.session?.participants).toEqual([
        { id: 'athlete-1', color: '#FF6B6B' },
        { id: 'athlete-2', color: participantColor('athlete-2') },
      ]);
    });

    it('should ignore a duplicate join and an unknown leave', () => {
      const store = loadedStore();
      expect(store.applyParticipantJoined('athlete-1', '#000000')).toBe(false);
      expect(store.applyParticipantLeft('athlete-9')).toBe(false);
      expect(store.session?.participants).toEqual([{ id: 'athlete-1', color: '#FF6B6B' }]);
    });

    it('should remove a leaving participant', () => {
      const store = loadedStore();
      store.applyParticipantJoined('athlete-2', '#4ECDC4');

      expect(store.applyParticipantLeft('athlete-2')).toBe(true);

      expect(store.session?.participants.map((p) => p.id)).toEqual(['athlete-1']);
    });

    it('should not bump the state version for document changes', () => {
      const store = loadedStore();
      store.applyParticipantJoined('athlete-2');
      store.applyCursorMoved('athlete-2', { exerciseId: 'bench', setId: 's1' });
      store.applySessionUpdated({ status: 'complete' });
      expect(store.version).toBe(0);
    });

    it('should set and clear a participant cursor', () => {
      const store = loadedStore();

      expect(store.applyCursorMoved('athlete-1', { exerciseId: 'bench', setId: 's2' })).toBe(true);
      expect(store.session?.participants[0]?.cursor).toEqual({ exerciseId: 'bench', setId: 's2' });
      expect(store.applyCursorMoved('athlete-1', { exerciseId: 'bench', setId: 's2' })).toBe(false);

      expect(store.applyCursorMoved('athlete-1', null)).toBe(true);
      expect(store.session?.participants[0]).toEqual({ id: 'athlete-1', color: '#FF6B6B' });
    });

    it('should update session status and name', () => {
      const store = loadedStore();

      store.applySessionUpdated({ status: 'complete' });
      expect(store.session).toMatchObject({ status: 'complete', name: 'Push day' });

      store.applySessionUpdated({ name: null });
      expect(store.session?.name).toBeNull();

      expect(store.applySessionUpdated({})).toBe(false);
    });

    it('should mark a set complete idempotently', () => {
      const store = loadedStore();
      expect(store.applySetCompleted('bench', 's1')).toBe(true);
      expect(store.applySetCompleted('bench', 's1')).toBe(false);
      expect(store.version).toBe(1);
    });

    it('should patch only the given set fields', () => {
      const store = loadedStore();

      store.applySetUpdated('bench', 's1', { type: 'warmup' });

      expect(store.getSet('bench', 's1')).toEqual(makeSet('s1', 1, { type: 'warmup' }));
    });

    it('should patch exercises and ignore a set that already exists', () => {
      const store = loadedStore();

      store.applyExerciseUpdated('bench', { rest: 120, order: 2 });
      expect(store.getExercise('bench')).toMatchObject({ rest: 120, order: 2, type: 'single' });

      expect(store.applySetAdded('bench', makeSet('s1', 9))).toBe(false);
      expect(store.applySetAdded('bench', makeSet('s4', 4))).toBe(true);
      expect(setIds(store)).toEqual(['s1', 's2', 's3', 's4']);
    });
  });

  describe('changes$', () => {
    it('should report the source, kind and version of each change', () => {
      const store = new SessionStateStore();
      const changes: SessionChange[] = [];
      store.changes$.subscribe((change) => changes.push(change));

      store.applySync(makeState([makeExercise('bench', [makeSet('s1', 1)])], 4));
      store.toggleSetComplete('bench', 's1');
      store.applySetDeleted('bench', 's1');
      store.toggleSetComplete('bench', 's1');

      expect(changes).toEqual([
        { source: 'sync', kind: 'session_sync', version: 4 },
        { source: 'local', kind: 'set_complete', version: 5 },
        { source: 'remote', kind: 'set_delete', version: 6 },
      ]);
    });

    it('should publish the new snapshot before notifying', () => {
      const store = loadedStore();
      const seen: number[] = [];
      store.changes$.subscribe(() => seen.push(store.version));

      store.toggleSetComplete('bench', 's1');

      expect(seen).toEqual([1]);
    });
  });
});
