/**
 * @fileoverview Session fixtures
 */

import type { SessionEvent, SessionEventType, SessionState } from '../core/types/index.js';
import { MemoryBackend, type MemoryBackendOptions } from '../infrastructure/backend/index.js';
import { DEFAULT_SETTINGS, type TillerSettings } from '../infrastructure/settings/index.js';
import { EventChannel, type EventLog } from '../interface/events/index.js';
import { AgentSession, newSessionState } from '../runtime/agent/index.js';

export class MemoryEventLog implements EventLog {
  readonly events: SessionEvent[] = [];

  append(event: SessionEvent): void {
    this.events.push(event);
  }

  read(afterSequence = 0): SessionEvent[] {
    return this.events.filter(event => event.sequence > afterSequence);
  }

  clear(): void {
    this.events.length = 0;
  }

  types(): SessionEventType[] {
    return this.events.map(event => event.type);
  }

  ofType<T extends SessionEventType>(type: T): Array<Extract<SessionEvent, { type: T }>> {
    const matches: Array<Extract<SessionEvent, { type: T }>> = [];
    for (const event of this.events) {
      if (isOfType(event, type)) matches.push(event);
    }
    return matches;
  }
}

function isOfType<T extends SessionEventType>(
  event: SessionEvent,
  type: T
): event is Extract<SessionEvent, { type: T }> {
  return event.type === type;
}

export interface TestSession {
  session: AgentSession;
  backend: MemoryBackend;
  log: MemoryEventLog;
  channel: EventChannel;
}

export function createTestSession(
  options: {
    id?: string;
    backend?: MemoryBackendOptions;
    state?: Partial<SessionState>;
    settings?: TillerSettings;
  } = {}
): TestSession {
  const id = options.id ?? 'test-session';
  const backend = new MemoryBackend(options.backend);
  const log = new MemoryEventLog();
  const channel = new EventChannel({ sessionId: id, log });
  const state: SessionState = { ...newSessionState(id, backend.id), ...options.state };
  const session = new AgentSession({
    state,
    backend,
    channel,
    settings: options.settings ?? DEFAULT_SETTINGS,
  });
  return { session, backend, log, channel };
}
