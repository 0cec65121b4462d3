/**
 * Core type definitions for termnotes
 */

export type BackendKind = 'filesystem' | 'memory';

/**
 * What the store does when writing the collection to its backend fails.
 * - soft: log, publish a sync-failed event and keep the in-memory change
 * - hard: roll the in-memory change back and reject the mutating call
 */
export type SyncFailurePolicy = 'soft' | 'hard';

export interface StorageConfig {
  backend: BackendKind;
  notesPath: string;
  syncFailurePolicy: SyncFailurePolicy;
}

export interface LoggingConfig {
  level: string;
  file: string;
}

export interface AppConfig {
  storage: StorageConfig;
  logging: LoggingConfig;
  /** Problems found while reading the environment; defaults were used instead. */
  warnings: string[];
}

export interface Note {
  id: number;
  title: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Event types published by the note store
 */
export enum NoteEventType {
  NoteCreated = 'note-created',
  NoteUpdated = 'note-updated',
  NoteDeleted = 'note-deleted',
  SyncCompleted = 'sync-completed',
  SyncFailed = 'sync-failed',
}

export interface NoteEvent {
  type: NoteEventType;
  timestamp: Date;
  noteId?: number;
  payload?: Record<string, unknown>;
}

export type EventListener = (event: NoteEvent) => void;
