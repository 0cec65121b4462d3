import type { Note } from '../../types/index.js';
import { contentCaretPosition } from '../draft.js';
import type { EditingMode, ViewState } from '../interaction-model.js';
import {
  Viewport,
  bodyHeight,
  firstVisibleRow,
  isTooSmall,
  previewBodyHeight,
  previewWidth,
  sidebarWidth,
  visibleRows,
} from '../layout.js';
import type { MarkdownRenderer } from './markdown.js';
import { caretWindow, fit, pad } from './text.js';
import type { Theme } from './theme.js';

export interface FrameCollaborators {
  theme: Theme;
  renderMarkdown: MarkdownRenderer;
}

export const INITIALIZING = 'Initializing...';
export const TOO_SMALL = 'Terminal too small. Please resize.';
export const NORMAL_HELP = 'n: new  e: edit  d: delete  ↑/↓: navigate  q: quit';
export const EDIT_HELP = 'Ctrl+S: Save  |  Esc: Cancel  |  Tab: Switch field';
export const CARET = '█';

/** Fixed lines of the edit screen around the content area. */
const EDIT_CHROME_HEIGHT = 8;

function singleLine(text: string): string {
  return text.replace(/\r?\n/g, ' ');
}

export function previewLine(content: string): string {
  const first = content.split('\n')[0];
  return first ? first : 'No content';
}

function statusLine(view: ViewState, width: number, theme: Theme): string {
  if (view.error) {
    return theme.error(fit(`Error: ${view.error}`, width));
  }
  if (view.status) {
    return theme.muted(fit(view.status, width));
  }
  return '';
}

function sidebar(view: ViewState, width: number, height: number, theme: Theme): string[] {
  const rows = bodyHeight(height);
  const lines = [theme.title(pad('Notes', width)), pad('', width)];

  if (view.notes.length === 0) {
    lines.push(theme.muted(pad('No notes yet', width)));
  } else {
    const first = firstVisibleRow(view.selection, height);
    const last = Math.min(view.notes.length, first + visibleRows(height));
    for (let index = first; index < last; index++) {
      const note = view.notes[index];
      const selected = index === view.selection;
      const title = pad(`${selected ? '▌ ' : '  '}${singleLine(note.title)}`, width);
      lines.push(selected ? theme.selected(title) : title);
      lines.push(theme.muted(pad(`  ${previewLine(note.content)}`, width)));
      lines.push(pad('', width));
    }
  }

  while (lines.length < rows) {
    lines.push(pad('', width));
  }
  return lines.slice(0, rows);
}

/**
 * The rendered note body at the given width; the raw text when markdown
 * rendering fails.
 */
export function previewBody(note: Note, width: number, { renderMarkdown }: FrameCollaborators): string[] {
  try {
    return renderMarkdown(note.content, width);
  } catch {
    return note.content.split('\n').map((line) => fit(line, width));
  }
}

function preview(view: ViewState, viewport: Viewport, collaborators: FrameCollaborators): string[] {
  const { theme } = collaborators;
  const width = previewWidth(viewport.width);
  const note = view.notes[view.selection];
  if (!note) {
    return [theme.muted(fit('No note selected', width))];
  }

  const body = previewBody(note, width, collaborators);
  const rows = previewBodyHeight(viewport.height);
  const offset = Math.max(0, Math.min(view.previewOffset, body.length - rows));

  return [
    theme.title(fit(singleLine(note.title), width)),
    theme.divider('─'.repeat(Math.min(width, 80))),
    '',
    ...body.slice(offset, offset + rows),
  ];
}

function normalView(view: ViewState, viewport: Viewport, collaborators: FrameCollaborators): string[] {
  const { theme } = collaborators;
  const rows = bodyHeight(viewport.height);
  const side = sidebar(view, sidebarWidth(viewport.width), viewport.height, theme);
  const pane = preview(view, viewport, collaborators);

  const lines: string[] = [];
  for (let row = 0; row < rows; row++) {
    lines.push(side[row] + theme.divider('│') + (pane[row] ?? ''));
  }
  lines.push(theme.muted(fit(NORMAL_HELP, viewport.width)));
  lines.push(statusLine(view, viewport.width, theme));
  return lines;
}

function editView(view: ViewState, mode: EditingMode, viewport: Viewport, theme: Theme): string[] {
  const { width, height } = viewport;
  const { draft } = mode;
  const rule = theme.divider('─'.repeat(Math.min(width, 80)));
  const titleActive = draft.activeField === 'title';

  const field = width - 2;
  const titleLine = titleActive
    ? `> ${caretWindow(draft.title, draft.caret, CARET, field)}`
    : fit(`  ${draft.title}`, width);

  const rows = height - EDIT_CHROME_HEIGHT;
  const contentLines = draft.content.split('\n');
  const caret = titleActive ? undefined : contentCaretPosition(draft);
  const start = caret ? Math.max(0, caret.line - rows + 1) : 0;

  const content: string[] = [];
  for (let index = start; index < start + rows; index++) {
    const line = contentLines[index];
    if (line === undefined) {
      content.push('');
    } else if (caret && index === caret.line) {
      content.push(`> ${caretWindow(line, caret.column, CARET, field)}`);
    } else {
      content.push(fit(`  ${line}`, width));
    }
  }

  return [
    theme.title(mode.kind === 'create' ? 'Create New Note' : 'Edit Note'),
    rule,
    theme.muted(fit('Title (Tab to switch fields):', width)),
    titleLine,
    theme.muted('Content:'),
    ...content,
    rule,
    theme.muted(fit(EDIT_HELP, width)),
    statusLine(view, width, theme),
  ];
}

/**
 * Draw the whole screen as text, exactly `viewport.height` lines once the
 * terminal size is known. Pure: reads nothing but its arguments.
 */
export function renderFrame(view: ViewState, collaborators: FrameCollaborators): string {
  const { viewport } = view;
  if (!viewport) {
    return INITIALIZING;
  }
  if (isTooSmall(viewport)) {
    return TOO_SMALL;
  }

  const lines =
    view.mode.kind === 'normal'
      ? normalView(view, viewport, collaborators)
      : editView(view, view.mode, viewport, collaborators.theme);
  return lines.join('\n');
}
