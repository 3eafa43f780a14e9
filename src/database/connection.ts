/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.docrag/docrag.db
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;
let exitHookRegistered = false;

/**
 * Open a database with the pragmas every docrag connection needs.
 *
 * Pass ':memory:' for a throwaway database in tests.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(path);

  // Chunk cascade deletes depend on this (OFF by default in SQLite)
  connection.pragma('foreign_keys = ON');
  connection.pragma('journal_mode = WAL');

  return connection;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database and its directory on first call.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS n FROM documents').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());

  if (!exitHookRegistered) {
    process.on('exit', () => closeDb());
    exitHookRegistered = true;
  }

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
