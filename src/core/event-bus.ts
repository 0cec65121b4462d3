import { EventListener, NoteEventType, NoteEvent } from '../types/index.js';
import logger from '../utils/logger.js';

/**
 * Where the note store announces changes and sync outcomes. `'*'` receives
 * every event.
 */
export interface IEventBus {
  subscribe(type: NoteEventType | '*', listener: EventListener): void;
  unsubscribe(type: NoteEventType | '*', listener: EventListener): void;
  emit(event: NoteEvent): void;
}

/**
 * Delivers each event inside `emit`, so listeners see it before the store
 * call that published it resolves. Listeners run in subscription order and
 * one that throws is logged and skipped.
 */
export class EventBus implements IEventBus {
  private listeners: Map<NoteEventType | '*', Set<EventListener>>;

  constructor() {
    this.listeners = new Map();
  }

  subscribe(type: NoteEventType | '*', listener: EventListener): void {
    let listeners = this.listeners.get(type);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(type, listeners);
    }
    listeners.add(listener);
  }

  unsubscribe(type: NoteEventType | '*', listener: EventListener): void {
    const listeners = this.listeners.get(type);
    if (!listeners) {
      return;
    }
    listeners.delete(listener);
    if (listeners.size === 0) {
      this.listeners.delete(type);
    }
  }

  emit(event: NoteEvent): void {
    const listeners = new Set<EventListener>();
    const specific = this.listeners.get(event.type);
    const wildcard = this.listeners.get('*');

    if (specific) {
      specific.forEach((listener) => listeners.add(listener));
    }
    if (wildcard) {
      wildcard.forEach((listener) => listeners.add(listener));
    }

    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error({ err, eventType: event.type }, 'Event listener execution failed');
      }
    }
  }
}

export function createEventBus(): IEventBus {
  return new EventBus();
}
