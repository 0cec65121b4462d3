import type { ZodIssue } from 'zod';

export class NoteNotFoundError extends Error {
  readonly id: number;

  constructor(id: number) {
    super(`Note ${id} not found`);
    this.name = 'NoteNotFoundError';
    this.id = id;
  }
}

/**
 * Persisted notes could not be decoded (malformed JSON, invalid records,
 * duplicate ids).
 */
export class NoteDecodeError extends Error {
  readonly source: string;
  readonly issues: readonly ZodIssue[];

  constructor(message: string, source: string, issues: readonly ZodIssue[] = [], cause?: unknown) {
    super(message, { cause });
    this.name = 'NoteDecodeError';
    this.source = source;
    this.issues = issues;
  }
}

/**
 * Writing the collection to the backend failed and the mutation was rolled back.
 */
export class NoteSyncError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'NoteSyncError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
