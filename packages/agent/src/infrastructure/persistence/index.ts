/**
 * @fileoverview Persistence exports
 */

export { DatabaseConnection, DEFAULT_DATABASE_CONFIG, type DatabaseConfig } from './database.js';
export { runMigrations, migrations, MigrationRunner } from './migrations/index.js';
export type { Migration, MigrationResult } from './migrations/index.js';
export { SqliteSessionStore, type SessionStore } from './session-store.js';
export { parseSessionState } from './session-schema.js';
