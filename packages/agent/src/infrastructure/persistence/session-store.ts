/**
 * @fileoverview Session Store
 *
 * Durable home of session aggregates and their event logs. All operations are
 * synchronous: better-sqlite3 never yields, so an append and the broadcast
 * that follows it cannot be interleaved with another writer.
 */

import {
  isSessionEventBody,
  isSessionStatus,
  type SessionEvent,
  type SessionState,
  type SessionSummary,
} from '../../core/types/index.js';
import { PersistenceError } from '../../core/errors/index.js';
import { createLogger } from '../logging/index.js';
import type { DatabaseConnection } from './database.js';
import { EventRepository, type EventRow } from './repositories/event.repo.js';
import { SessionRepository } from './repositories/session.repo.js';
import { parseSessionState } from './session-schema.js';

const logger = createLogger('session-store');

export interface SessionStore {
  loadSession(sessionId: string): SessionState | null;
  saveSession(state: SessionState): void;
  listSessions(): SessionSummary[];
  /** @returns true when the session existed */
  deleteSession(sessionId: string): boolean;
  appendEvent(sessionId: string, event: SessionEvent): void;
  /** Events with sequence greater than `afterSequence`, ascending */
  readEvents(sessionId: string, afterSequence?: number): SessionEvent[];
  lastSequence(sessionId: string): number;
  clearEvents(sessionId: string): void;
  close(): void;
}

export class SqliteSessionStore implements SessionStore {
  private readonly sessions: SessionRepository;
  private readonly events: EventRepository;

  constructor(private readonly connection: DatabaseConnection) {
    connection.open();
    this.sessions = new SessionRepository(connection);
    this.events = new EventRepository(connection);
  }

  loadSession(sessionId: string): SessionState | null {
    const row = this.sessions.getById(sessionId);
    if (!row) {
      return null;
    }
    try {
      return parseSessionState(JSON.parse(row.state));
    } catch (error) {
      throw new PersistenceError(`Stored state for session ${sessionId} is unreadable`, {
        table: 'sessions',
        operation: 'read',
        context: { sessionId },
        cause: error,
      });
    }
  }

  saveSession(state: SessionState): void {
    this.sessions.upsert({
      id: state.id,
      name: state.name,
      status: state.status,
      backendId: state.backendId,
      state: JSON.stringify(state),
      createdAt: state.createdAt,
      updatedAt: state.updatedAt,
    });
  }

  listSessions(): SessionSummary[] {
    return this.sessions.list().map(row => ({
      id: row.id,
      name: row.name,
      status: isSessionStatus(row.status) ? row.status : 'idle',
      backendId: row.backend_id,
      turnCount: countTurns(row.state),
      updatedAt: row.updated_at,
    }));
  }

  deleteSession(sessionId: string): boolean {
    // events cascade through the foreign key
    return this.sessions.delete(sessionId);
  }

  appendEvent(sessionId: string, event: SessionEvent): void {
    const { sequence, timestamp, ...body } = event;
    try {
      this.events.insert({
        session_id: sessionId,
        sequence,
        type: event.type,
        payload: JSON.stringify(body),
        timestamp,
      });
    } catch (error) {
      throw new PersistenceError(`Cannot append event ${sequence} to session ${sessionId}`, {
        table: 'events',
        operation: 'write',
        context: { sessionId, sequence, type: event.type },
        cause: error,
      });
    }
  }

  readEvents(sessionId: string, afterSequence = 0): SessionEvent[] {
    const result: SessionEvent[] = [];
    for (const row of this.events.listBySession(sessionId, afterSequence)) {
      const event = toSessionEvent(row);
      if (event) {
        result.push(event);
      } else {
        logger.warn('Skipping unreadable event', { sessionId, sequence: row.sequence, type: row.type });
      }
    }
    return result;
  }

  lastSequence(sessionId: string): number {
    return this.events.lastSequence(sessionId);
  }

  clearEvents(sessionId: string): void {
    const removed = this.events.deleteBySession(sessionId);
    logger.debug('Cleared event log', { sessionId, removed });
  }

  close(): void {
    this.connection.close();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function toSessionEvent(row: EventRow): SessionEvent | null {
  let body: unknown;
  try {
    body = JSON.parse(row.payload);
  } catch {
    return null;
  }
  if (!isSessionEventBody(body)) {
    return null;
  }
  return { ...body, sequence: row.sequence, timestamp: row.timestamp };
}

function countTurns(state: string): number {
  try {
    const parsed: unknown = JSON.parse(state);
    if (typeof parsed === 'object' && parsed !== null && 'history' in parsed && Array.isArray(parsed.history)) {
      return parsed.history.length;
    }
  } catch {
    return 0;
  }
  return 0;
}
