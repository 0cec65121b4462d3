import { z } from 'zod';
import { NoteDecodeError } from '../core/errors.js';
import type { Note } from '../types/index.js';

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp: ${value}` });
      return z.NEVER;
    }
    return date;
  });

const noteId = z.number().int().nonnegative();

const NoteRecordSchema = z.object({
  id: noteId,
  title: z.string(),
  content: z.string(),
  createdAt: timestamp,
  updatedAt: timestamp,
});

/**
 * Files written by earlier releases used capitalized field names.
 */
const LegacyNoteRecordSchema = z
  .object({
    ID: noteId,
    Title: z.string(),
    Content: z.string(),
    CreatedAt: timestamp,
    UpdatedAt: timestamp,
  })
  .transform(
    (record): Note => ({
      id: record.ID,
      title: record.Title,
      content: record.Content,
      createdAt: record.CreatedAt,
      updatedAt: record.UpdatedAt,
    })
  );

export const NoteFileSchema = z
  .array(z.union([NoteRecordSchema, LegacyNoteRecordSchema]))
  .nullable()
  .transform((notes): Note[] => notes ?? [])
  .superRefine((notes, ctx) => {
    const seen = new Set<number>();
    notes.forEach((note, index) => {
      if (seen.has(note.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate note id ${note.id}`,
        });
      }
      seen.add(note.id);
    });
  });

/**
 * Serialize notes as an indented JSON array with a fixed key order.
 */
export function encodeNotes(notes: readonly Note[]): string {
  const records = notes.map((note) => ({
    id: note.id,
    title: note.title,
    content: note.content,
    createdAt: note.createdAt.toISOString(),
    updatedAt: note.updatedAt.toISOString(),
  }));
  return JSON.stringify(records, null, 2);
}

/**
 * Parse and validate a persisted notes document.
 * @param source - where the text came from, used in error messages
 */
export function decodeNotes(text: string, source: string): Note[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new NoteDecodeError(`Failed to parse notes from ${source}`, source, [], error);
  }

  const result = NoteFileSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new NoteDecodeError(
      `Invalid notes in ${source}${where}: ${first?.message ?? 'unknown error'}`,
      source,
      result.error.issues
    );
  }
  return result.data;
}
