/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking applied ones in
 * `_migrations`. Safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';

/**
 * Result of running migrations.
 *
 * Failures are reported instead of thrown so callers decide how to react.
 */
export interface MigrationResult {
  /** Names of migrations that were applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded as strings so the bundled CLI needs no SQL files on disk
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Documents: one row per ingested file, deduplicated by content hash
CREATE TABLE IF NOT EXISTS documents (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_name TEXT NOT NULL,
  file_path TEXT NOT NULL,
  file_hash TEXT NOT NULL UNIQUE,
  file_size_bytes INTEGER NOT NULL,
  total_chunks INTEGER NOT NULL,
  embedding_model TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Chunks: owned by a document, removed with it
CREATE TABLE IF NOT EXISTS document_chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id INTEGER NOT NULL,
  chunk_index INTEGER NOT NULL,
  chunk_text TEXT NOT NULL,
  embedding_blob BLOB NOT NULL,
  embedding_json TEXT,
  token_count INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  UNIQUE (document_id, chunk_index),
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_document_chunks_document_id ON document_chunks(document_id);
    `.trim(),
  },
  {
    name: '002-add-display-name.sql',
    sql: `
-- Optional user-facing name; readers fall back to file_name
ALTER TABLE documents ADD COLUMN display_name TEXT;
    `.trim(),
  },
];

/** Connections already migrated in this process */
let migrated = new WeakSet<Database.Database>();

/**
 * Run all pending migrations.
 *
 * Each migration runs in its own transaction. A failed migration is reported
 * and the remaining ones are still attempted.
 *
 * @param db - Connection to migrate (defaults to the shared connection)
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migrated.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(getAppliedMigrations(db).map((row) => row.name));

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Only remember success, so a failed run is retried next time
  if (failed.length === 0) {
    migrated.add(db);
  }

  return { applied, failed };
}

/**
 * List applied migrations in order.
 */
export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  const rows: unknown[] = db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all();
  return rows.flatMap((row) =>
    isMigrationRow(row) ? [{ name: row.name, applied_at: row.applied_at }] : []
  );
}

function isMigrationRow(row: unknown): row is { name: string; applied_at: string } {
  return (
    typeof row === 'object' &&
    row !== null &&
    'name' in row &&
    typeof row.name === 'string' &&
    'applied_at' in row &&
    typeof row.applied_at === 'string'
  );
}

/**
 * Forget which connections were migrated (tests).
 */
export function resetMigrationState(): void {
  migrated = new WeakSet();
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
