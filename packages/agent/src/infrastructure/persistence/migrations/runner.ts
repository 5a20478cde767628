/**
 * @fileoverview Migration Runner
 *
 * Tracks applied migrations in a schema_version table and applies pending
 * ones in version order, each inside its own transaction.
 */

import type Database from 'better-sqlite3';
import type { ColumnInfo, Migration, MigrationResult } from './types.js';

export class MigrationRunner {
  private readonly db: Database.Database;
  private readonly migrations: Migration[];

  constructor(db: Database.Database, migrations: Migration[]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  run(): MigrationResult {
    this.ensureVersionTable();

    const fromVersion = this.getCurrentVersion();
    const applied: number[] = [];

    for (const migration of this.migrations) {
      if (migration.version <= fromVersion) {
        continue;
      }
      this.db.transaction(() => {
        migration.up(this.db, this);
        this.recordMigration(migration);
      })();
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getCurrentVersion(),
      applied,
      migrated: applied.length > 0,
    };
  }

  getCurrentVersion(): number {
    if (!this.tableExists('schema_version')) {
      return 0;
    }
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
      .get();
    return row?.version ?? 0;
  }

  tableExists(tableName: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(tableName);
    return row !== undefined;
  }

  getTableColumns(tableName: string): string[] {
    return this.db
      .prepare<[], ColumnInfo>(`PRAGMA table_info(${tableName})`)
      .all()
      .map(col => col.name);
  }

  /**
   * Add a column unless it is already there.
   * @returns true when the column was added
   */
  addColumnIfNotExists(tableName: string, columnName: string, columnDef: string): boolean {
    if (this.getTableColumns(tableName).includes(columnName)) {
      return false;
    }
    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${columnDef}`);
    return true;
  }

  private ensureVersionTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL,
        description TEXT
      )
    `);
  }

  private recordMigration(migration: Migration): void {
    this.db
      .prepare("INSERT OR REPLACE INTO schema_version (version, applied_at, description) VALUES (?, datetime('now'), ?)")
      .run(migration.version, migration.description);
  }
}
