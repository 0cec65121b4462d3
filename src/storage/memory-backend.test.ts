import { beforeEach, describe, expect, it } from 'vitest';

import type { Note } from '../types/index.js';
import { MemoryBackend } from './memory-backend.js';

function createNote(partial?: Partial<Note>): Note {
  const base = {
    id: 1,
    title: 'Note',
    content: 'Hello world',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
  };
  return { ...base, ...partial };
}

describe('MemoryBackend', () => {
  let backend: MemoryBackend;

  beforeEach(() => {
    backend = new MemoryBackend();
  });

  it('starts empty', async () => {
    expect(await backend.loadAll()).toEqual([]);
    expect(backend.saveCount).toBe(0);
  });

  it('returns the last saved collection', async () => {
    await backend.saveAll([createNote({ id: 1 }), createNote({ id: 2 })]);
    await backend.saveAll([createNote({ id: 3 })]);

    expect((await backend.loadAll()).map((note) => note.id)).toEqual([3]);
    expect(backend.saveCount).toBe(2);
  });

  it('keeps its own copy of saved notes', async () => {
    const note = createNote();
    await backend.saveAll([note]);

    note.title = 'changed after save';
    note.updatedAt.setUTCFullYear(2030);

    const [stored] = await backend.loadAll();
    expect(stored.title).toBe('Note');
    expect(stored.updatedAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('can be seeded with notes', async () => {
    const seeded = new MemoryBackend([createNote({ id: 9 })]);
    expect(await seeded.loadAll()).toEqual([createNote({ id: 9 })]);
  });
});
