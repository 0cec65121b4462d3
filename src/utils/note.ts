import type { Note } from '../types/index.js';

export const UNTITLED = 'Untitled';

export function normalizeTitle(title: string): string {
  return title === '' ? UNTITLED : title;
}

export function cloneNote(note: Note): Note {
  return {
    ...note,
    createdAt: new Date(note.createdAt.getTime()),
    updatedAt: new Date(note.updatedAt.getTime()),
  };
}

/**
 * Most recently updated first; ties fall back to the newer id.
 */
export function byRecency(a: Note, b: Note): number {
  return b.updatedAt.getTime() - a.updatedAt.getTime() || b.id - a.id;
}
