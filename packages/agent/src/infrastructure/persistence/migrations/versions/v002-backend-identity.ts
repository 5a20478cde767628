/**
 * @fileoverview Backend identity column
 *
 * Sessions created before execution backends were distinguished belong to
 * the local backend.
 */

import type { Migration } from '../types.js';

export const migration: Migration = {
  version: 2,
  description: 'Add backend_id to sessions',
  up: (db, runner) => {
    runner.addColumnIfNotExists('sessions', 'backend_id', "TEXT NOT NULL DEFAULT 'local'");
    db.exec('CREATE INDEX IF NOT EXISTS idx_events_type ON events(session_id, type)');
  },
};
