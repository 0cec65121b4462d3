/**
 * Uncommitted title/content text held while creating or editing a note.
 *
 * Drafts are immutable values; every edit returns a new draft. The caret is
 * an offset in Unicode code points into the active field.
 */

export type DraftField = 'title' | 'content';

export interface Draft {
  readonly title: string;
  readonly content: string;
  readonly activeField: DraftField;
  readonly caret: number;
}

function codePoints(text: string): string[] {
  return Array.from(text);
}

export function textLength(text: string): number {
  return codePoints(text).length;
}

export function emptyDraft(): Draft {
  return { title: '', content: '', activeField: 'title', caret: 0 };
}

/**
 * Draft for editing an existing note: title active, caret after the title.
 */
export function draftFrom(title: string, content: string): Draft {
  return { title, content, activeField: 'title', caret: textLength(title) };
}

export function activeText(draft: Draft): string {
  return draft.activeField === 'title' ? draft.title : draft.content;
}

function withActiveText(draft: Draft, text: string, caret: number): Draft {
  return draft.activeField === 'title'
    ? { ...draft, title: text, caret }
    : { ...draft, content: text, caret };
}

export function insertText(draft: Draft, text: string): Draft {
  const chars = codePoints(activeText(draft));
  const inserted = codePoints(text);
  chars.splice(draft.caret, 0, ...inserted);
  return withActiveText(draft, chars.join(''), draft.caret + inserted.length);
}

export function deleteBackward(draft: Draft): Draft {
  if (draft.caret === 0) {
    return draft;
  }
  const chars = codePoints(activeText(draft));
  chars.splice(draft.caret - 1, 1);
  return withActiveText(draft, chars.join(''), draft.caret - 1);
}

export function moveCaret(draft: Draft, delta: number): Draft {
  const max = textLength(activeText(draft));
  const caret = Math.min(max, Math.max(0, draft.caret + delta));
  return caret === draft.caret ? draft : { ...draft, caret };
}

export function moveCaretToEdge(draft: Draft, edge: 'start' | 'end'): Draft {
  const caret = edge === 'start' ? 0 : textLength(activeText(draft));
  return { ...draft, caret };
}

export function focusField(draft: Draft, field: DraftField): Draft {
  const text = field === 'title' ? draft.title : draft.content;
  return { ...draft, activeField: field, caret: textLength(text) };
}

export function switchField(draft: Draft): Draft {
  return focusField(draft, draft.activeField === 'title' ? 'content' : 'title');
}

/**
 * Titles are single-line: a newline in the title moves focus to the content.
 */
export function insertNewline(draft: Draft): Draft {
  return draft.activeField === 'title' ? focusField(draft, 'content') : insertText(draft, '\n');
}

/**
 * Line index and column (code points) of the caret within the content field.
 */
export function contentCaretPosition(draft: Draft): { line: number; column: number } {
  const before = codePoints(draft.content).slice(0, draft.caret).join('');
  const lines = before.split('\n');
  return { line: lines.length - 1, column: textLength(lines[lines.length - 1]) };
}
