/**
 * Test Fixtures
 *
 * In-memory stores, a deterministic embedding provider and temp files.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type Database from 'better-sqlite3';

import { openDatabase, runMigrations, SQLiteVectorStore } from '../database/index.js';
import { EmbeddingProviderError } from '../errors/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/index.js';

export interface TestStore {
  db: Database.Database;
  store: SQLiteVectorStore;
  close: () => void;
}

/**
 * Migrated in-memory database with a store on top.
 */
export function createTestStore(now?: () => number): TestStore {
  const db = openDatabase(':memory:');
  runMigrations(db);
  return { db, store: new SQLiteVectorStore(db, { now }), close: () => db.close() };
}

export const FAKE_DIMENSIONS = 8;

/**
 * Bag-of-words embedding: each word adds 1 to a bucket picked from its
 * character codes. Same text, same vector.
 */
export function fakeEmbedding(text: string, dimensions = FAKE_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().split(/\s+/).filter(Boolean)) {
    let sum = 0;
    for (const char of word) {
      sum += char.charCodeAt(0);
    }
    vector[sum % dimensions] = (vector[sum % dimensions] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  /**
   * @param failOnCall 1-based call number that rejects (unreachable)
   */
  constructor(private readonly failOnCall?: number) {}

  async embed(_model: string, text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.calls.length === this.failOnCall) {
      throw new EmbeddingProviderError('unreachable', 'Cannot reach embedding server');
    }
    return fakeEmbedding(text);
  }
}

export interface TempDir {
  path: string;
  write: (name: string, content: string | Buffer) => string;
  cleanup: () => void;
}

export function createTempDir(prefix = 'docrag-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    write: (name, content) => {
      const filePath = join(path, name);
      writeFileSync(filePath, content);
      return filePath;
    },
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
