import type { Note } from '../types/index.js';
import type { Backend } from './backend.js';
import { cloneNote } from '../utils/note.js';

/**
 * In-memory Backend implementation.
 * Keeps a private copy of the last saved collection; nothing survives the process.
 */
export class MemoryBackend implements Backend {
  private notes: Note[];
  private saves = 0;

  constructor(initial: Note[] = []) {
    this.notes = initial.map(cloneNote);
  }

  async saveAll(notes: Note[]): Promise<void> {
    this.notes = notes.map(cloneNote);
    this.saves++;
  }

  async loadAll(): Promise<Note[]> {
    return this.notes.map(cloneNote);
  }

  /**
   * Number of completed saveAll calls.
   */
  get saveCount(): number {
    return this.saves;
  }
}
