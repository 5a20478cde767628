/**
 * @fileoverview Event Channel
 *
 * The single path from a session's producers to its observers. Each emitted
 * body is stamped with the next sequence number, appended to the durable log
 * and then broadcast to every observer, strictly in emit order. An emit made
 * while a broadcast is in progress is queued and delivered after it.
 *
 * An event that cannot be persisted is never broadcast: its sequence number
 * is released, anything queued behind it is dropped, and the failure is
 * raised to the producer as a PersistenceError.
 */

import { PersistenceError } from '../../core/errors/index.js';
import type { SessionEvent, SessionEventBody } from '../../core/types/index.js';
import { createLogger, type TillerLogger } from '../../infrastructure/logging/index.js';

export type EventObserver = (event: SessionEvent) => void;

/**
 * Durable, append-only log of one session's events.
 */
export interface EventLog {
  append(event: SessionEvent): void;
  read(afterSequence?: number): SessionEvent[];
  clear(): void;
}

export interface EventChannelOptions {
  sessionId: string;
  log: EventLog;
  /** Sequence of the last event already in the log */
  lastSequence?: number;
  now?: () => Date;
}

export class EventChannel {
  readonly sessionId: string;
  private readonly log: EventLog;
  private readonly now: () => Date;
  private readonly observers = new Set<EventObserver>();
  private readonly queue: SessionEventBody[] = [];
  private sequence: number;
  private draining = false;
  private readonly logger: TillerLogger;

  constructor(options: EventChannelOptions) {
    this.sessionId = options.sessionId;
    this.log = options.log;
    this.sequence = options.lastSequence ?? 0;
    this.now = options.now ?? (() => new Date());
    this.logger = createLogger('event-channel', { sessionId: options.sessionId });
  }

  get lastSequence(): number {
    return this.sequence;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  /**
   * @throws PersistenceError when the log rejects the event
   */
  emit(body: SessionEventBody): void {
    this.queue.push(body);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        this.deliver(next);
        next = this.queue.shift();
      }
    } catch (error) {
      if (this.queue.length > 0) {
        this.logger.warn('Dropped queued events after a persist failure', { dropped: this.queue.length });
        this.queue.length = 0;
      }
      throw error;
    } finally {
      this.draining = false;
    }
  }

  /**
   * Everything persisted so far, oldest first.
   */
  history(afterSequence = 0): SessionEvent[] {
    return this.log.read(afterSequence);
  }

  /**
   * @returns a function that removes the observer
   */
  subscribe(observer: EventObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Drop the durable log and restart numbering. Observers stay attached.
   */
  clear(): void {
    this.log.clear();
    this.sequence = 0;
  }

  private deliver(body: SessionEventBody): void {
    const event: SessionEvent = { ...body, sequence: this.sequence + 1, timestamp: this.now().toISOString() };

    try {
      this.log.append(event);
    } catch (error) {
      const failure = error instanceof PersistenceError
        ? error
        : new PersistenceError('Failed to persist event', {
          table: 'events',
          operation: 'write',
          context: { sessionId: this.sessionId, sequence: event.sequence, type: event.type },
          cause: error,
        });
      this.logger.error('Failed to persist event', failure);
      throw failure;
    }
    this.sequence = event.sequence;

    for (const observer of [...this.observers]) {
      try {
        observer(event);
      } catch (error) {
        this.logger.warn('Observer threw while handling event', {
          sequence: event.sequence,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/**
 * EventLog over a session store's event table.
 */
export function storeEventLog(
  store: {
    appendEvent(sessionId: string, event: SessionEvent): void;
    readEvents(sessionId: string, afterSequence?: number): SessionEvent[];
    clearEvents(sessionId: string): void;
  },
  sessionId: string
): EventLog {
  return {
    append: event => store.appendEvent(sessionId, event),
    read: afterSequence => store.readEvents(sessionId, afterSequence),
    clear: () => store.clearEvents(sessionId),
  };
}
