import type { Backend } from '../storage/backend.js';
import type { IEventBus } from '../core/event-bus.js';
import { NoteDecodeError, NoteNotFoundError, NoteSyncError, errorMessage } from '../core/errors.js';
import { Note, NoteEventType, SyncFailurePolicy } from '../types/index.js';
import { byRecency, cloneNote, normalizeTitle } from '../utils/note.js';
import logger from '../utils/logger.js';

export interface NoteStoreOptions {
  /** `null` keeps notes in memory only. */
  backend: Backend | null;
  syncFailurePolicy?: SyncFailurePolicy;
  eventBus?: IEventBus;
  clock?: () => Date;
}

/**
 * Owns the canonical note collection.
 *
 * Every effective mutation writes the full, ordered collection to the backend
 * before the call resolves. Mutations are serialized, so at most one
 * `saveAll` is in flight and snapshots reach the backend in call order.
 */
export class NoteStore {
  private notes = new Map<number, Note>();
  private nextId = 1;
  private lastTimestamp = 0;
  private pending: Promise<void> = Promise.resolve();
  private readonly backend: Backend | null;
  private readonly policy: SyncFailurePolicy;
  private readonly eventBus?: IEventBus;
  private readonly clock: () => Date;

  constructor(options: NoteStoreOptions) {
    this.backend = options.backend;
    this.policy = options.syncFailurePolicy ?? 'soft';
    this.eventBus = options.eventBus;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create a store and load its backend's collection.
   */
  static async open(options: NoteStoreOptions): Promise<NoteStore> {
    const store = new NoteStore(options);
    await store.initialize();
    return store;
  }

  /**
   * Load every persisted note, keeping ids and timestamps.
   * Should be called once, before any other operation.
   */
  async initialize(): Promise<void> {
    if (!this.backend) {
      logger.info('No backend configured, notes will not be persisted');
      return;
    }

    const loaded = await this.backend.loadAll();
    const notes = new Map<number, Note>();
    for (const note of loaded) {
      if (notes.has(note.id)) {
        throw new NoteDecodeError(`Duplicate note id ${note.id}`, 'backend');
      }
      notes.set(note.id, cloneNote(note));
      this.nextId = Math.max(this.nextId, note.id + 1);
      this.lastTimestamp = Math.max(this.lastTimestamp, note.updatedAt.getTime());
    }
    this.notes = notes;
    logger.info({ count: notes.size, nextId: this.nextId }, 'Loaded notes from backend');
  }

  async create(title: string, content: string): Promise<Note> {
    return this.enqueue(async () => {
      const now = this.now();
      const note: Note = {
        id: this.nextId++,
        title: normalizeTitle(title),
        content,
        createdAt: now,
        updatedAt: now,
      };

      const previous = new Map(this.notes);
      this.notes.set(note.id, note);
      await this.synchronize(previous, 'create');

      logger.info({ id: note.id }, 'Note created');
      this.publish(NoteEventType.NoteCreated, note.id);
      return cloneNote(note);
    });
  }

  /**
   * Replace a note's title and content.
   * An unknown id is a no-op and resolves `undefined`.
   */
  async update(id: number, title: string, content: string): Promise<Note | undefined> {
    return this.enqueue(async () => {
      const existing = this.notes.get(id);
      if (!existing) {
        logger.debug({ id }, 'Update skipped, note not found');
        return undefined;
      }

      const updated: Note = {
        ...existing,
        title: normalizeTitle(title),
        content,
        updatedAt: this.now(),
      };

      const previous = new Map(this.notes);
      this.notes.set(id, updated);
      await this.synchronize(previous, 'update');

      logger.info({ id }, 'Note updated');
      this.publish(NoteEventType.NoteUpdated, id);
      return cloneNote(updated);
    });
  }

  /**
   * Remove a note. Resolves `false` when the id is unknown.
   */
  async delete(id: number): Promise<boolean> {
    return this.enqueue(async () => {
      if (!this.notes.has(id)) {
        logger.debug({ id }, 'Delete skipped, note not found');
        return false;
      }

      const previous = new Map(this.notes);
      this.notes.delete(id);
      await this.synchronize(previous, 'delete');

      logger.info({ id }, 'Note deleted');
      this.publish(NoteEventType.NoteDeleted, id);
      return true;
    });
  }

  /**
   * @throws NoteNotFoundError
   */
  get(id: number): Note {
    const note = this.notes.get(id);
    if (!note) {
      throw new NoteNotFoundError(id);
    }
    return cloneNote(note);
  }

  list(): Note[] {
    return Array.from(this.notes.values()).sort(byRecency).map(cloneNote);
  }

  count(): number {
    return this.notes.size;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    // The chain only orders work; each caller sees its own rejection through `run`.
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Strictly increasing wall-clock time, so a note touched in the same
   * millisecond as another still sorts ahead of it.
   */
  private now(): Date {
    const time = Math.max(this.clock().getTime(), this.lastTimestamp + 1);
    this.lastTimestamp = time;
    return new Date(time);
  }

  private async synchronize(previous: Map<number, Note>, operation: string): Promise<void> {
    if (!this.backend) {
      return;
    }

    const snapshot = this.list();
    try {
      await this.backend.saveAll(snapshot);
    } catch (error) {
      this.publish(NoteEventType.SyncFailed, undefined, {
        operation,
        error: errorMessage(error),
        policy: this.policy,
      });

      if (this.policy === 'hard') {
        this.notes = previous;
        logger.error({ error, operation }, 'Failed to sync notes, change rolled back');
        throw new NoteSyncError(`Failed to save notes (${operation}): ${errorMessage(error)}`, error);
      }

      logger.error({ error, operation }, 'Failed to sync notes, keeping in-memory change');
      return;
    }

    logger.debug({ operation, count: snapshot.length }, 'Notes synced to backend');
    this.publish(NoteEventType.SyncCompleted, undefined, { operation, count: snapshot.length });
  }

  private publish(type: NoteEventType, noteId?: number, payload?: Record<string, unknown>): void {
    this.eventBus?.emit({ type, timestamp: new Date(), noteId, payload });
  }
}
