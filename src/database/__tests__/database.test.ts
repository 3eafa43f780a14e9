/**
 * Database Module Tests
 *
 * Connection pragmas, migrations, the embedding codec and row validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase } from '../connection.js';
import {
  runMigrations,
  getAppliedMigrations,
  getMigrationCount,
  resetMigrationState,
} from '../migrate.js';
import { embeddingToBlob, blobToEmbedding } from '../schema.js';
import {
  DocumentRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from '../validation.js';

describe('migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    resetMigrationState();
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('applies every migration once', () => {
    const first = runMigrations(db);

    expect(first.failed).toEqual([]);
    expect(first.applied).toEqual(['001-initial.sql', '002-add-display-name.sql']);
    expect(getAppliedMigrations(db).map((m) => m.name)).toHaveLength(getMigrationCount());
  });

  it('is a no-op on an already migrated connection', () => {
    runMigrations(db);
    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
  });

  it('skips migrations recorded in _migrations after a state reset', () => {
    runMigrations(db);
    resetMigrationState();

    expect(runMigrations(db).applied).toEqual([]);
  });

  it('creates the documents and chunks tables', () => {
    runMigrations(db);
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .pluck()
      .all()
      .map(String);

    expect(tables).toEqual(expect.arrayContaining(['documents', 'document_chunks', '_migrations']));
  });

  it('reports no applied migrations on a fresh database', () => {
    expect(getAppliedMigrations(db)).toEqual([]);
  });
});

describe('openDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docrag-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories and enables foreign keys and WAL', () => {
    const db = openDatabase(join(dir, 'nested', 'docrag.db'));

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    db.close();
  });
});

describe('embedding codec', () => {
  it('round-trips float32 values', () => {
    const blob = embeddingToBlob([0.5, -1, 2.25]);

    expect(blob.length).toBe(12);
    expect(Array.from(blobToEmbedding(blob))).toEqual([0.5, -1, 2.25]);
  });

  it('accepts Float32Array input without copying values', () => {
    const floats = new Float32Array([1, 2]);
    expect(Array.from(blobToEmbedding(embeddingToBlob(floats)))).toEqual([1, 2]);
  });

  it('decodes a Buffer that starts at an unaligned offset', () => {
    const backing = Buffer.alloc(13);
    const blob = backing.subarray(1);
    embeddingToBlob([3, 4, 5]).copy(blob);

    expect(Array.from(blobToEmbedding(blob))).toEqual([3, 4, 5]);
  });
});

describe('row validation', () => {
  const validRow = {
    id: 1,
    file_name: 'guide.md',
    file_path: '/docs/guide.md',
    display_name: null,
    file_hash: 'abc',
    file_size_bytes: 10,
    total_chunks: 2,
    embedding_model: 'nomic-embed-text',
    created_at: 1,
    updated_at: 1,
  };

  it('returns typed data for valid rows', () => {
    expect(validateRow(DocumentRowSchema, validRow, 'documents').file_name).toBe('guide.md');
  });

  it('throws SchemaValidationError with the failing path', () => {
    try {
      validateRow(DocumentRowSchema, { ...validRow, total_chunks: 'two' }, 'documents.id=1');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.message).toBe('Database schema mismatch in documents.id=1');
        expect(error.issues[0]?.path).toBe('total_chunks');
        expect(error.code).toBe(5);
      }
    }
  });

  it('indexes the failing row in validateRows', () => {
    expect(() => validateRows(DocumentRowSchema, [validRow, { id: 2 }], 'documents')).toThrow(
      'Database schema mismatch in documents[1]'
    );
  });
});
