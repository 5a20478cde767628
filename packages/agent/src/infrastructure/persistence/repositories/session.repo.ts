/**
 * @fileoverview Session Repository
 *
 * One row per session. The aggregate lives in the `state` JSON column; name,
 * status and backend are duplicated into columns for listing.
 */

import { BaseRepository } from './base.js';

export interface SessionRow {
  id: string;
  name: string;
  status: string;
  state: string;
  backend_id: string;
  created_at: string;
  updated_at: string;
}

export interface SessionUpsert {
  id: string;
  name: string;
  status: string;
  backendId: string;
  state: string;
  createdAt: string;
  updatedAt: string;
}

export class SessionRepository extends BaseRepository {
  upsert(row: SessionUpsert): void {
    this.run(
      `INSERT INTO sessions (id, name, status, state, backend_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         name = excluded.name,
         status = excluded.status,
         state = excluded.state,
         backend_id = excluded.backend_id,
         updated_at = excluded.updated_at`,
      row.id,
      row.name,
      row.status,
      row.state,
      row.backendId,
      row.createdAt,
      row.updatedAt
    );
  }

  getById(id: string): SessionRow | undefined {
    return this.get<SessionRow>('SELECT * FROM sessions WHERE id = ?', id);
  }

  list(): SessionRow[] {
    return this.all<SessionRow>('SELECT * FROM sessions ORDER BY updated_at DESC');
  }

  /**
   * @returns true when a row was deleted
   */
  delete(id: string): boolean {
    return this.run('DELETE FROM sessions WHERE id = ?', id).changes > 0;
  }
}
