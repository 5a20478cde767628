/**
 * @fileoverview Replay Engine
 *
 * Brings a newly attached observer up to date with a session. Reading the log
 * and subscribing happen in one synchronous step, so the observer receives
 * every event exactly once: first the persisted log as replay entries, then a
 * state summary, then `replay_done`, then the live stream. Live events that
 * arrive while the replay is being sent are held back until it is done.
 */

import { SessionNotFoundError } from '../../core/errors/index.js';
import type {
  OutboundMessage,
  ReplayStateMessage,
  ResumedMessage,
  SessionEvent,
} from '../../core/types/index.js';
import { createLogger } from '../../infrastructure/logging/index.js';
import type { EventChannel } from './event-channel.js';

const logger = createLogger('replay');

export type MessageObserver = (message: OutboundMessage) => void;

/**
 * What the engine needs from a session to replay it.
 */
export interface ReplaySource {
  readonly channel: EventChannel;
  resumed(): Omit<ResumedMessage, 'type' | 'lastSequence'>;
  replayState(): Omit<ReplayStateMessage, 'type'>;
}

export class ReplayEngine {
  constructor(private readonly resolve: (sessionId: string) => ReplaySource | undefined) {}

  /**
   * Replay a session to an observer and keep it subscribed.
   * @returns a function that detaches the observer
   */
  attach(sessionId: string, observer: MessageObserver): () => void {
    const source = this.resolve(sessionId);
    if (!source) {
      throw new SessionNotFoundError(sessionId);
    }
    const { channel } = source;

    const held: SessionEvent[] = [];
    let live = false;
    const unsubscribe = channel.subscribe(event => {
      if (live) {
        observer(event);
      } else {
        held.push(event);
      }
    });
    const entries = channel.history();
    const lastSequence = channel.lastSequence;

    try {
      observer({ type: 'resumed', ...source.resumed(), lastSequence });
      for (const event of entries) {
        if (event.sequence <= lastSequence) {
          observer({ type: 'replay', sequence: event.sequence, event });
        }
      }
      observer({ type: 'replay_state', ...source.replayState() });
      observer({ type: 'replay_done', lastSequence });

      live = true;
      for (const event of held) {
        if (event.sequence > lastSequence) {
          observer(event);
        }
      }
    } catch (error) {
      unsubscribe();
      throw error;
    }

    logger.debug('Observer attached', { sessionId, replayed: entries.length, lastSequence, held: held.length });
    return unsubscribe;
  }
}
