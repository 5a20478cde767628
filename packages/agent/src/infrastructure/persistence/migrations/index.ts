/**
 * @fileoverview Migration System Exports
 */

import type Database from 'better-sqlite3';
import { MigrationRunner } from './runner.js';
import type { Migration, MigrationResult } from './types.js';
import { migration as v001Initial } from './versions/v001-initial.js';
import { migration as v002BackendIdentity } from './versions/v002-backend-identity.js';

export const migrations: Migration[] = [
  v001Initial,
  v002BackendIdentity,
];

export function runMigrations(db: Database.Database): MigrationResult {
  return new MigrationRunner(db, migrations).run();
}

export { MigrationRunner };
export type { Migration, MigrationResult, ColumnInfo } from './types.js';
