import type { NoteStore } from '../services/note-store.js';
import { errorMessage } from '../core/errors.js';
import type { Note } from '../types/index.js';
import { normalizeTitle } from '../utils/note.js';
import logger from '../utils/logger.js';
import {
  Draft,
  deleteBackward,
  draftFrom,
  emptyDraft,
  insertNewline,
  insertText,
  moveCaret,
  moveCaretToEdge,
  switchField,
} from './draft.js';
import type { InputEvent, KeyEvent, MouseEvent } from './input.js';
import {
  Viewport,
  WHEEL_SCROLL_LINES,
  noteIndexAt,
  previewBodyHeight,
  previewWidth,
  sidebarWidth,
} from './layout.js';

export type Mode =
  | { kind: 'normal' }
  | { kind: 'create'; draft: Draft }
  | { kind: 'edit'; noteId: number; draft: Draft };

export type EditingMode = Exclude<Mode, { kind: 'normal' }>;

export type HandleResult = 'continue' | 'quit';

/**
 * The store operations the model needs.
 */
export type NoteSource = Pick<NoteStore, 'create' | 'update' | 'delete' | 'list'>;

/**
 * Number of body lines the preview shows for a note at a pane width.
 */
export type PreviewMeasure = (note: Note, width: number) => number;

export interface InteractionModelOptions {
  /** Defaults to the note's raw line count. */
  measurePreview?: PreviewMeasure;
}

/**
 * Everything the renderer needs to draw a frame.
 */
export interface ViewState {
  readonly mode: Mode;
  readonly notes: readonly Note[];
  readonly selection: number;
  /** First note body line shown in the preview pane. */
  readonly previewOffset: number;
  /** `null` until the first resize event reports the terminal size. */
  readonly viewport: Viewport | null;
  readonly error: string | null;
  readonly status: string | null;
}

const NORMAL: Mode = { kind: 'normal' };

const rawLineCount: PreviewMeasure = (note) => note.content.split('\n').length;

/**
 * State machine over normal, create and edit modes.
 *
 * Holds the note snapshot last read from the store and the selection into it.
 * Notes are only changed through the store; the model itself only edits drafts.
 */
export class InteractionModel {
  private mode: Mode = NORMAL;
  private notes: Note[];
  private selection = 0;
  private previewOffset = 0;
  private viewport: Viewport | null = null;
  private error: string | null = null;
  private status: string | null = null;
  private readonly store: NoteSource;
  private readonly measurePreview: PreviewMeasure;

  constructor(store: NoteSource, options: InteractionModelOptions = {}) {
    this.store = store;
    this.measurePreview = options.measurePreview ?? rawLineCount;
    this.notes = store.list();
  }

  get view(): ViewState {
    return {
      mode: this.mode,
      notes: this.notes,
      selection: this.selection,
      previewOffset: this.previewOffset,
      viewport: this.viewport,
      error: this.error,
      status: this.status,
    };
  }

  get selectedNote(): Note | undefined {
    return this.notes[this.selection];
  }

  /**
   * Show a transient message on the status line, e.g. a background sync failure.
   */
  notify(message: string): void {
    this.status = message;
  }

  clearNotice(): void {
    this.status = null;
  }

  async handle(event: InputEvent): Promise<HandleResult> {
    switch (event.type) {
      case 'resize':
        this.viewport = { width: event.width, height: event.height };
        this.scrollPreview(0);
        return 'continue';
      case 'mouse':
        if (this.mode.kind === 'normal') {
          this.handleMouse(event);
        }
        return 'continue';
      case 'key':
        if (this.mode.kind === 'normal') {
          return this.handleNormalKey(event);
        }
        await this.handleEditKey(this.mode, event);
        return 'continue';
    }
  }

  private async handleNormalKey(event: KeyEvent): Promise<HandleResult> {
    const command = event.name === 'char' ? event.char : event.name;

    if (event.ctrl) {
      return command === 'c' ? 'quit' : 'continue';
    }

    switch (command) {
      case 'q':
        return 'quit';
      case 'n':
        this.startCreate();
        break;
      case 'e':
      case 'enter':
        this.startEdit();
        break;
      case 'd':
      case 'delete':
        await this.deleteSelected();
        break;
      case 'up':
      case 'k':
        this.select(this.selection - 1);
        break;
      case 'down':
      case 'j':
        this.select(this.selection + 1);
        break;
      case 'home':
      case 'g':
        this.select(0);
        break;
      case 'end':
      case 'G':
        this.select(this.notes.length - 1);
        break;
      case 'pagedown':
        this.scrollPreview(this.pageSize());
        break;
      case 'pageup':
        this.scrollPreview(-this.pageSize());
        break;
    }
    return 'continue';
  }

  private async handleEditKey(mode: EditingMode, event: KeyEvent): Promise<void> {
    if (event.ctrl) {
      if (event.char === 's') {
        await this.save(mode);
      }
      return;
    }

    switch (event.name) {
      case 'escape':
        this.cancel();
        return;
      case 'tab':
        this.setDraft(mode, switchField(mode.draft));
        return;
      case 'enter':
        this.setDraft(mode, insertNewline(mode.draft));
        return;
      case 'backspace':
        this.setDraft(mode, deleteBackward(mode.draft));
        return;
      case 'left':
        this.setDraft(mode, moveCaret(mode.draft, -1));
        return;
      case 'right':
        this.setDraft(mode, moveCaret(mode.draft, 1));
        return;
      case 'home':
        this.setDraft(mode, moveCaretToEdge(mode.draft, 'start'));
        return;
      case 'end':
        this.setDraft(mode, moveCaretToEdge(mode.draft, 'end'));
        return;
      case 'char':
        if (event.char) {
          this.setDraft(mode, insertText(mode.draft, event.char));
        }
        return;
    }
  }

  private handleMouse(event: MouseEvent): void {
    if (!this.viewport) {
      return;
    }

    switch (event.action) {
      case 'press': {
        if (event.button !== 'left') {
          return;
        }
        const index = noteIndexAt(this.viewport, this.selection, this.notes.length, event.x, event.y);
        if (index !== undefined) {
          this.select(index);
        }
        return;
      }
      case 'wheel-up':
      case 'wheel-down': {
        const step = event.action === 'wheel-up' ? -1 : 1;
        if (event.x < sidebarWidth(this.viewport.width)) {
          this.select(this.selection + step);
        } else {
          this.scrollPreview(step * WHEEL_SCROLL_LINES);
        }
        return;
      }
    }
  }

  private startCreate(): void {
    this.mode = { kind: 'create', draft: emptyDraft() };
    this.error = null;
  }

  private startEdit(): void {
    const note = this.selectedNote;
    if (!note) {
      return;
    }
    this.mode = { kind: 'edit', noteId: note.id, draft: draftFrom(note.title, note.content) };
    this.error = null;
  }

  private cancel(): void {
    this.mode = NORMAL;
    this.error = null;
  }

  private setDraft(mode: EditingMode, draft: Draft): void {
    this.mode = { ...mode, draft };
  }

  private async save(mode: EditingMode): Promise<void> {
    const title = normalizeTitle(mode.draft.title);
    const { content } = mode.draft;

    let savedId: number | undefined;
    this.status = null;
    try {
      if (mode.kind === 'create') {
        savedId = (await this.store.create(title, content)).id;
      } else {
        const updated = await this.store.update(mode.noteId, title, content);
        if (!updated) {
          this.status = 'Note no longer exists; changes were not saved';
        }
        savedId = updated?.id;
      }
    } catch (error) {
      logger.warn({ error, mode: mode.kind }, 'Saving note failed');
      this.error = errorMessage(error);
      return;
    }

    this.mode = NORMAL;
    this.error = null;
    this.reload(savedId);
  }

  private async deleteSelected(): Promise<void> {
    const note = this.selectedNote;
    if (!note) {
      return;
    }

    this.status = null;
    try {
      await this.store.delete(note.id);
      this.error = null;
    } catch (error) {
      logger.warn({ error, id: note.id }, 'Deleting note failed');
      this.error = errorMessage(error);
    }
    this.reload();
  }

  /**
   * Re-read the snapshot and keep the selection in range, preferring the
   * given note when it is still listed.
   */
  private reload(selectId?: number): void {
    this.notes = this.store.list();
    const index = selectId === undefined ? -1 : this.notes.findIndex((note) => note.id === selectId);
    this.select(index === -1 ? this.selection : index);
  }

  private select(index: number): void {
    this.selection = Math.max(0, Math.min(index, this.notes.length - 1));
    this.previewOffset = 0;
  }

  private pageSize(): number {
    return this.viewport ? previewBodyHeight(this.viewport.height) : 1;
  }

  /**
   * Move the preview by `delta` lines, keeping the last page filled.
   */
  private scrollPreview(delta: number): void {
    const note = this.selectedNote;
    if (!note || !this.viewport) {
      this.previewOffset = 0;
      return;
    }
    const lines = this.measurePreview(note, previewWidth(this.viewport.width));
    const max = Math.max(0, lines - previewBodyHeight(this.viewport.height));
    this.previewOffset = Math.max(0, Math.min(this.previewOffset + delta, max));
  }
}
