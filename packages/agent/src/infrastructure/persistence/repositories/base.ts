/**
 * @fileoverview Base Repository
 *
 * Shared query helpers over the better-sqlite3 handle. Result row types are
 * supplied through the statement generics.
 */

import type Database from 'better-sqlite3';
import type { DatabaseConnection } from '../database.js';

export abstract class BaseRepository {
  protected readonly connection: DatabaseConnection;

  constructor(connection: DatabaseConnection) {
    this.connection = connection;
  }

  protected get db(): Database.Database {
    return this.connection.getDatabase();
  }

  protected now(): string {
    return new Date().toISOString();
  }

  protected all<R>(sql: string, ...params: unknown[]): R[] {
    return this.db.prepare<unknown[], R>(sql).all(...params);
  }

  protected get<R>(sql: string, ...params: unknown[]): R | undefined {
    return this.db.prepare<unknown[], R>(sql).get(...params);
  }

  protected run(sql: string, ...params: unknown[]): Database.RunResult {
    return this.db.prepare(sql).run(...params);
  }
}
