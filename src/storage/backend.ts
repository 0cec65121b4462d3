import type { Note } from '../types/index.js';

/**
 * Durable persistence of the whole note collection.
 * Every write replaces the full persisted representation; there are no
 * incremental operations.
 */
export interface Backend {
  /**
   * Replace everything persisted with the given notes.
   * Rejects on any I/O failure.
   */
  saveAll(notes: Note[]): Promise<void>;

  /**
   * Return every persisted note, or an empty array when nothing has been
   * persisted yet. Rejects on corrupt data or any other read failure.
   */
  loadAll(): Promise<Note[]>;
}
