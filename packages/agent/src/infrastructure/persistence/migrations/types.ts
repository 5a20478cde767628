/**
 * @fileoverview Migration Types
 */

import type Database from 'better-sqlite3';
import type { MigrationRunner } from './runner.js';

export interface Migration {
  /** Unique, sequential version number */
  version: number;
  description: string;
  up: (db: Database.Database, runner: MigrationRunner) => void;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  applied: number[];
  migrated: boolean;
}

/**
 * Row from PRAGMA table_info
 */
export interface ColumnInfo {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}
