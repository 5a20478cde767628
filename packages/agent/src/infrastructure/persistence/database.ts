/**
 * @fileoverview SQLite Database Connection Management
 *
 * Opens the better-sqlite3 handle, applies pragmas and runs migrations.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { PersistenceError } from '../../core/errors/index.js';
import { createLogger } from '../logging/index.js';
import { runMigrations } from './migrations/index.js';

const logger = createLogger('database');

export interface DatabaseConfig {
  dbPath: string;
  enableWAL: boolean;
  busyTimeout: number;
  /** Page cache in KB */
  cacheSize: number;
}

export const DEFAULT_DATABASE_CONFIG = {
  enableWAL: true,
  busyTimeout: 5000,
  cacheSize: 32000,
} as const;

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private readonly config: DatabaseConfig;

  constructor(dbPath: string, config?: Partial<Omit<DatabaseConfig, 'dbPath'>>) {
    this.config = {
      dbPath,
      enableWAL: config?.enableWAL ?? DEFAULT_DATABASE_CONFIG.enableWAL,
      busyTimeout: config?.busyTimeout ?? DEFAULT_DATABASE_CONFIG.busyTimeout,
      cacheSize: config?.cacheSize ?? DEFAULT_DATABASE_CONFIG.cacheSize,
    };
  }

  /**
   * Open the connection, configure pragmas and bring the schema up to date.
   * Idempotent.
   */
  open(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const { dbPath } = this.config;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new PersistenceError(`Cannot open database at ${dbPath}`, {
        table: '*',
        operation: 'read',
        cause: error,
      });
    }

    this.configurePragmas(db);
    const result = runMigrations(db);
    if (result.migrated) {
      logger.info('Database migrated', { dbPath, from: result.fromVersion, to: result.toVersion });
    }

    this.db = db;
    return db;
  }

  close(): void {
    if (!this.db) return;
    try {
      this.db.pragma('optimize');
    } catch (error) {
      logger.debug('pragma optimize failed during close', { error: String(error) });
    }
    this.db.close();
    this.db = null;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * @throws PersistenceError if the connection is not open
   */
  getDatabase(): Database.Database {
    if (!this.db) {
      throw new PersistenceError('Database not open. Call open() first.', { table: '*', operation: 'read' });
    }
    return this.db;
  }

  getPath(): string {
    return this.config.dbPath;
  }

  /**
   * Run `fn` in a transaction. better-sqlite3 transactions are synchronous.
   */
  transaction<T>(fn: () => T): T {
    return this.getDatabase().transaction(fn)();
  }

  private configurePragmas(db: Database.Database): void {
    const { enableWAL, busyTimeout, cacheSize, dbPath } = this.config;

    // WAL is meaningless for in-memory databases
    if (enableWAL && dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma(`busy_timeout = ${busyTimeout}`);
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
    db.pragma(`cache_size = -${cacheSize}`);
    db.pragma('temp_store = MEMORY');
  }
}
