import type { IEventBus } from '../core/event-bus.js';
import { errorMessage } from '../core/errors.js';
import { EventListener, NoteEventType } from '../types/index.js';
import logger from '../utils/logger.js';
import { InputEvent, decodeInput } from './input.js';
import type { InteractionModel, ViewState } from './interaction-model.js';

const ESC = '\x1b[';

const ENTER_SCREEN = [
  `${ESC}?1049h`, // alternate screen
  `${ESC}?25l`, // hide cursor
  `${ESC}?1000h`, // button press/release reporting
  `${ESC}?1006h`, // SGR mouse encoding
].join('');

const LEAVE_SCREEN = [`${ESC}?1006l`, `${ESC}?1000l`, `${ESC}?25h`, `${ESC}?1049l`].join('');

/** The parts of stdin the app touches. */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of stdout the app touches. */
export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(data: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface TerminalAppOptions {
  model: InteractionModel;
  render: (view: ViewState) => string;
  input: TerminalInput;
  output: TerminalOutput;
  /** Sync failures published here are shown on the status line until the next successful sync. */
  eventBus?: IEventBus;
}

/**
 * Runs the interaction model against a real terminal.
 *
 * Input chunks are decoded and queued; each event is handled to completion
 * (store sync included) before the next one starts.
 */
export class TerminalApp {
  private readonly model: InteractionModel;
  private readonly render: (view: ViewState) => string;
  private readonly input: TerminalInput;
  private readonly output: TerminalOutput;
  private readonly eventBus?: IEventBus;
  private queue: Promise<void> = Promise.resolve();
  private running = false;
  private finish: (() => void) | null = null;

  constructor(options: TerminalAppOptions) {
    this.model = options.model;
    this.render = options.render;
    this.input = options.input;
    this.output = options.output;
    this.eventBus = options.eventBus;
  }

  /**
   * Take over the terminal and resolve once the user quits.
   */
  run(): Promise<void> {
    if (this.running) {
      throw new Error('Terminal app is already running');
    }
    this.running = true;

    const done = new Promise<void>((resolve) => {
      this.finish = resolve;
    });

    this.output.write(ENTER_SCREEN);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.output.on('resize', this.onResize);
    this.eventBus?.subscribe(NoteEventType.SyncFailed, this.onSyncFailed);
    this.eventBus?.subscribe(NoteEventType.SyncCompleted, this.onSyncCompleted);
    this.input.resume();

    logger.info('Terminal UI started');
    this.draw();
    this.onResize();
    return done;
  }

  /**
   * Wait for every queued event to be handled.
   */
  idle(): Promise<void> {
    return this.queue;
  }

  private readonly onData = (chunk: string): void => {
    for (const event of decodeInput(chunk)) {
      this.enqueue(event);
    }
  };

  private readonly onEnd = (): void => {
    logger.info('Input closed');
    this.stop();
  };

  private readonly onResize = (): void => {
    this.enqueue({
      type: 'resize',
      width: this.output.columns ?? 80,
      height: this.output.rows ?? 24,
    });
  };

  private readonly onSyncFailed: EventListener = (event) => {
    const reason = event.payload?.error;
    this.model.notify(`Sync failed: ${typeof reason === 'string' ? reason : 'unknown error'}`);
  };

  private readonly onSyncCompleted: EventListener = () => {
    this.model.clearNotice();
  };

  private enqueue(event: InputEvent): void {
    this.queue = this.queue.then(() => this.dispatch(event));
  }

  private async dispatch(event: InputEvent): Promise<void> {
    if (!this.running) {
      return;
    }

    try {
      const result = await this.model.handle(event);
      if (result === 'quit') {
        this.stop();
        return;
      }
    } catch (error) {
      logger.error({ error, eventType: event.type }, 'Event handling failed');
      this.model.notify(`Error: ${errorMessage(error)}`);
    }
    this.draw();
  }

  private draw(): void {
    const lines = this.render(this.model.view).split('\n');
    // Home, overwrite line by line, clear leftovers from the previous frame.
    this.output.write(`${ESC}H${lines.map((line) => `${line}${ESC}K`).join('\r\n')}${ESC}J`);
  }

  /**
   * Give the terminal back and resolve `run()`. Safe to call more than once,
   * e.g. from signal handlers.
   */
  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.output.off('resize', this.onResize);
    this.eventBus?.unsubscribe(NoteEventType.SyncFailed, this.onSyncFailed);
    this.eventBus?.unsubscribe(NoteEventType.SyncCompleted, this.onSyncCompleted);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.output.write(LEAVE_SCREEN);

    logger.info('Terminal UI stopped');
    this.finish?.();
    this.finish = null;
  }
}
