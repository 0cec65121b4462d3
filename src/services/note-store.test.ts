import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EventBus } from '../core/event-bus.js';
import { NoteDecodeError, NoteNotFoundError, NoteSyncError } from '../core/errors.js';
import type { Backend } from '../storage/backend.js';
import { FileSystemBackend } from '../storage/file-system-backend.js';
import { MemoryBackend } from '../storage/memory-backend.js';
import { Note, NoteEventType } from '../types/index.js';
import { NoteStore } from './note-store.js';

function fixedClock(start = Date.parse('2024-06-01T12:00:00.000Z')) {
  let current = start;
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function failingBackend(initial: Note[] = []): Backend & { failing: boolean } {
  const inner = new MemoryBackend(initial);
  return {
    failing: false,
    async saveAll(notes: Note[]) {
      if (this.failing) {
        throw new Error('disk full');
      }
      await inner.saveAll(notes);
    },
    loadAll: () => inner.loadAll(),
  };
}

describe('NoteStore', () => {
  let backend: MemoryBackend;
  let store: NoteStore;

  beforeEach(async () => {
    backend = new MemoryBackend();
    store = await NoteStore.open({ backend });
  });

  describe('create', () => {
    it('returns a single listed note with equal timestamps', async () => {
      const note = await store.create('Shopping List', '- milk');

      const notes = store.list();
      expect(notes).toHaveLength(1);
      expect(notes[0].title).toBe('Shopping List');
      expect(notes[0].content).toBe('- milk');
      expect(notes[0].createdAt.getTime()).toBeGreaterThan(0);
      expect(notes[0].createdAt.getTime()).toBe(notes[0].updatedAt.getTime());
      expect(notes[0].id).toBe(note.id);
    });

    it('assigns distinct, increasing ids', async () => {
      const ids: number[] = [];
      for (let i = 0; i < 25; i++) {
        ids.push((await store.create(`note ${i}`, '')).id);
      }

      expect(new Set(ids).size).toBe(ids.length);
      for (let i = 1; i < ids.length; i++) {
        expect(ids[i]).toBeGreaterThan(ids[i - 1]);
      }
    });

    it('never reuses the id of a deleted note', async () => {
      const first = await store.create('first', '');
      const second = await store.create('second', '');
      await store.delete(second.id);

      const third = await store.create('third', '');
      expect(third.id).toBe(second.id + 1);
      expect(third.id).not.toBe(first.id);
    });

    it('replaces an empty title with the placeholder', async () => {
      const note = await store.create('', 'body');
      expect(note.title).toBe('Untitled');
    });

    it('writes the collection to the backend before resolving', async () => {
      await store.create('A', 'x');

      expect(backend.saveCount).toBe(1);
      expect((await backend.loadAll()).map((note) => note.title)).toEqual(['A']);
    });
  });

  describe('update', () => {
    it('replaces title and content and refreshes updatedAt', async () => {
      const created = await store.create('A', 'x');
      await store.update(created.id, 'B', 'y');

      const note = store.get(created.id);
      expect(note.title).toBe('B');
      expect(note.content).toBe('y');
      expect(note.updatedAt.getTime()).toBeGreaterThan(note.createdAt.getTime());
      expect(note.createdAt.getTime()).toBe(created.createdAt.getTime());
    });

    it('moves the updated note to the front of the list', async () => {
      const first = await store.create('first', '');
      await store.create('second', '');
      await store.create('third', '');

      expect(store.list().map((note) => note.title)).toEqual(['third', 'second', 'first']);

      await store.update(first.id, 'first, edited', '');
      expect(store.list()[0].title).toBe('first, edited');
    });

    it('is a silent no-op for an unknown id', async () => {
      await store.create('A', 'x');
      const before = store.list();
      const saves = backend.saveCount;

      await expect(store.update(999, 'B', 'y')).resolves.toBeUndefined();
      expect(store.list()).toEqual(before);
      expect(backend.saveCount).toBe(saves);
    });

    it('keeps createdAt <= updatedAt even when the wall clock goes backwards', async () => {
      const clock = fixedClock();
      const timed = await NoteStore.open({ backend: null, clock: clock.now });

      const note = await timed.create('A', '');
      clock.advance(-60_000);
      const updated = await timed.update(note.id, 'B', '');

      expect(updated?.updatedAt.getTime()).toBe(note.createdAt.getTime() + 1);
    });
  });

  describe('delete', () => {
    it('removes the note and syncs', async () => {
      const note = await store.create('A', 'x');

      await expect(store.delete(note.id)).resolves.toBe(true);
      expect(store.list()).toEqual([]);
      expect(await backend.loadAll()).toEqual([]);
    });

    it('is idempotent for an absent id', async () => {
      await store.create('A', 'x');
      const before = store.list();

      await expect(store.delete(42)).resolves.toBe(false);
      await expect(store.delete(42)).resolves.toBe(false);
      expect(store.list()).toEqual(before);
    });
  });

  describe('get', () => {
    it('throws NoteNotFoundError for an absent id', () => {
      expect(() => store.get(5)).toThrow(NoteNotFoundError);
      expect(() => store.get(5)).toThrow('Note 5 not found');
    });

    it('returns a copy that cannot change the store', async () => {
      const note = await store.create('A', 'x');

      const copy = store.get(note.id);
      copy.title = 'mutated';
      copy.updatedAt.setUTCFullYear(1999);

      expect(store.get(note.id).title).toBe('A');
      expect(store.get(note.id).updatedAt.getTime()).toBe(note.updatedAt.getTime());
    });
  });

  describe('list', () => {
    it('orders by updatedAt descending', async () => {
      const clock = fixedClock();
      const timed = await NoteStore.open({ backend: null, clock: clock.now });

      const a = await timed.create('a', '');
      clock.advance(1000);
      await timed.create('b', '');
      clock.advance(1000);
      await timed.create('c', '');
      clock.advance(1000);
      await timed.update(a.id, 'a2', '');

      const listed = timed.list();
      expect(listed.map((note) => note.title)).toEqual(['a2', 'c', 'b']);
      for (let i = 1; i < listed.length; i++) {
        expect(listed[i - 1].updatedAt.getTime()).toBeGreaterThanOrEqual(listed[i].updatedAt.getTime());
      }
    });

    it('breaks timestamp ties by the newer id', async () => {
      const stamp = new Date('2024-01-01T00:00:00.000Z');
      const seeded = new MemoryBackend([
        { id: 1, title: 'one', content: '', createdAt: stamp, updatedAt: stamp },
        { id: 2, title: 'two', content: '', createdAt: stamp, updatedAt: stamp },
      ]);
      const loaded = await NoteStore.open({ backend: seeded });

      expect(loaded.list().map((note) => note.id)).toEqual([2, 1]);
    });
  });

  describe('initialize', () => {
    it('loads existing notes keeping ids and timestamps', async () => {
      const createdAt = new Date('2023-01-01T00:00:00.000Z');
      const updatedAt = new Date('2023-02-01T00:00:00.000Z');
      const seeded = new MemoryBackend([{ id: 10, title: 'kept', content: 'c', createdAt, updatedAt }]);

      const loaded = await NoteStore.open({ backend: seeded });

      expect(loaded.get(10)).toEqual({ id: 10, title: 'kept', content: 'c', createdAt, updatedAt });
      expect((await loaded.create('next', '')).id).toBe(11);
    });

    it('fails when the backend cannot load', async () => {
      const broken: Backend = {
        saveAll: vi.fn(),
        loadAll: vi.fn(async () => {
          throw new NoteDecodeError('Invalid notes', 'test');
        }),
      };

      await expect(NoteStore.open({ backend: broken })).rejects.toBeInstanceOf(NoteDecodeError);
    });

    it('rejects duplicate ids from the backend', async () => {
      const stamp = new Date('2024-01-01T00:00:00.000Z');
      const duplicated: Backend = {
        saveAll: vi.fn(),
        loadAll: async () => [
          { id: 1, title: 'a', content: '', createdAt: stamp, updatedAt: stamp },
          { id: 1, title: 'b', content: '', createdAt: stamp, updatedAt: stamp },
        ],
      };

      await expect(NoteStore.open({ backend: duplicated })).rejects.toThrow('Duplicate note id 1');
    });

    it('works without a backend', async () => {
      const ephemeral = await NoteStore.open({ backend: null });
      const note = await ephemeral.create('A', 'x');

      expect(ephemeral.get(note.id).title).toBe('A');
      expect(ephemeral.count()).toBe(1);
    });
  });

  describe('synchronization', () => {
    it('serializes overlapping mutations so the last snapshot wins', async () => {
      const saved: string[][] = [];
      const recording: Backend = {
        saveAll: async (notes) => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          saved.push(notes.map((note) => note.title));
        },
        loadAll: async () => [],
      };
      const serial = await NoteStore.open({ backend: recording });

      await Promise.all([serial.create('a', ''), serial.create('b', ''), serial.create('c', '')]);

      expect(saved).toEqual([['a'], ['b', 'a'], ['c', 'b', 'a']]);
    });

    it('publishes note and sync events', async () => {
      const bus = new EventBus();
      const events: NoteEventType[] = [];
      bus.subscribe('*', (event) => events.push(event.type));
      const observed = await NoteStore.open({ backend: new MemoryBackend(), eventBus: bus });

      const note = await observed.create('A', '');
      await observed.update(note.id, 'B', '');
      await observed.delete(note.id);

      expect(events).toEqual([
        NoteEventType.SyncCompleted,
        NoteEventType.NoteCreated,
        NoteEventType.SyncCompleted,
        NoteEventType.NoteUpdated,
        NoteEventType.SyncCompleted,
        NoteEventType.NoteDeleted,
      ]);
    });

    describe('soft policy', () => {
      it('keeps the change and resolves when saving fails', async () => {
        const flaky = failingBackend();
        const bus = new EventBus();
        const failures = vi.fn();
        bus.subscribe(NoteEventType.SyncFailed, failures);
        const soft = await NoteStore.open({ backend: flaky, syncFailurePolicy: 'soft', eventBus: bus });

        flaky.failing = true;
        const note = await soft.create('unsaved', '');

        expect(soft.get(note.id).title).toBe('unsaved');
        expect(await flaky.loadAll()).toEqual([]);
        expect(failures).toHaveBeenCalledTimes(1);
        expect(failures.mock.calls[0][0].payload).toMatchObject({ operation: 'create', error: 'disk full' });
      });

      it('catches up on the next successful save', async () => {
        const flaky = failingBackend();
        const soft = await NoteStore.open({ backend: flaky });

        flaky.failing = true;
        await soft.create('first', '');
        flaky.failing = false;
        await soft.create('second', '');

        expect((await flaky.loadAll()).map((note) => note.title)).toEqual(['second', 'first']);
      });
    });

    describe('hard policy', () => {
      it('rolls back a create and rejects', async () => {
        const flaky = failingBackend();
        const hard = await NoteStore.open({ backend: flaky, syncFailurePolicy: 'hard' });
        await hard.create('kept', '');

        flaky.failing = true;
        await expect(hard.create('lost', '')).rejects.toBeInstanceOf(NoteSyncError);

        expect(hard.list().map((note) => note.title)).toEqual(['kept']);
      });

      it('rolls back an update and a delete', async () => {
        const flaky = failingBackend();
        const hard = await NoteStore.open({ backend: flaky, syncFailurePolicy: 'hard' });
        const note = await hard.create('original', 'body');

        flaky.failing = true;
        await expect(hard.update(note.id, 'changed', 'other')).rejects.toThrow(
          'Failed to save notes (update): disk full'
        );
        await expect(hard.delete(note.id)).rejects.toThrow('Failed to save notes (delete): disk full');

        expect(hard.get(note.id)).toEqual(note);
      });

      it('keeps accepting mutations after a failure', async () => {
        const flaky = failingBackend();
        const hard = await NoteStore.open({ backend: flaky, syncFailurePolicy: 'hard' });

        flaky.failing = true;
        await expect(hard.create('lost', '')).rejects.toThrow(NoteSyncError);
        flaky.failing = false;
        const saved = await hard.create('saved', '');

        expect(hard.list()).toEqual([saved]);
        expect(await flaky.loadAll()).toEqual([saved]);
      });
    });
  });

  describe('with the file system backend', () => {
    let dataDir: string;

    beforeEach(() => {
      dataDir = mkdtempSync(join(tmpdir(), 'termnotes-store-'));
    });

    afterEach(() => {
      rmSync(dataDir, { recursive: true, force: true });
    });

    it('persists notes across store instances', async () => {
      const notesPath = join(dataDir, 'notes.json');
      const first = await NoteStore.open({ backend: await FileSystemBackend.create(notesPath) });
      const created = await first.create('Persistent Note', 'This should persist');
      await first.create('Another', '# Header\n\nBody');

      const second = await NoteStore.open({ backend: await FileSystemBackend.create(notesPath) });

      expect(second.list()).toEqual(first.list());
      expect(second.get(created.id).content).toBe('This should persist');
    });
  });
});
