/**
 * @fileoverview Event Repository
 *
 * Append-only per-session event log. (session_id, sequence) is the primary
 * key, so a sequence number can never be written twice.
 */

import { BaseRepository } from './base.js';

export interface EventRow {
  session_id: string;
  sequence: number;
  type: string;
  payload: string;
  timestamp: string;
}

export class EventRepository extends BaseRepository {
  insert(row: EventRow): void {
    this.run(
      'INSERT INTO events (session_id, sequence, type, payload, timestamp) VALUES (?, ?, ?, ?, ?)',
      row.session_id,
      row.sequence,
      row.type,
      row.payload,
      row.timestamp
    );
  }

  /**
   * Events with sequence greater than `afterSequence`, in order.
   */
  listBySession(sessionId: string, afterSequence = 0): EventRow[] {
    return this.all<EventRow>(
      'SELECT * FROM events WHERE session_id = ? AND sequence > ? ORDER BY sequence ASC',
      sessionId,
      afterSequence
    );
  }

  lastSequence(sessionId: string): number {
    const row = this.get<{ last: number | null }>(
      'SELECT MAX(sequence) AS last FROM events WHERE session_id = ?',
      sessionId
    );
    return row?.last ?? 0;
  }

  countBySession(sessionId: string): number {
    const row = this.get<{ count: number }>('SELECT COUNT(*) AS count FROM events WHERE session_id = ?', sessionId);
    return row?.count ?? 0;
  }

  deleteBySession(sessionId: string): number {
    return this.run('DELETE FROM events WHERE session_id = ?', sessionId).changes;
  }
}
