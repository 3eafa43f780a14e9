/**
 * Vector Store
 *
 * Pure data access for documents and their embedded chunks. No ranking
 * logic lives here: retrieval bulk-loads chunks and scores them in memory.
 *
 * - Embeddings are stored as float32 BLOBs (optionally with a JSON debug copy)
 * - Rows are validated with Zod on the way out
 * - Deleting a document cascades to its chunks
 */

import Database from 'better-sqlite3';
import { getDb } from './connection.js';
import { runMigrations, type MigrationResult } from './migrate.js';
import {
  blobToEmbedding,
  embeddingToBlob,
  type Document,
  type DocumentChunk,
  type NewChunk,
  type NewDocument,
  type SourcedChunk,
} from './schema.js';
import {
  ChunkRowSchema,
  CountRowSchema,
  DocumentRowSchema,
  SourcedChunkRowSchema,
  validateRow,
  validateRows,
  type ChunkRow,
  type DocumentRow,
} from './validation.js';
import { DatabaseError, DuplicateDocumentError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** Rows fetched per query when bulk-loading chunks */
const LOAD_BATCH_SIZE = 1000;

/**
 * Storage contract used by ingestion and retrieval.
 */
export interface VectorStore {
  findByHash(fileHash: string): Document | undefined;
  getDocument(id: number): Document | undefined;
  getAllDocuments(): Document[];
  /** @throws DuplicateDocumentError when the hash is already stored */
  createDocument(input: NewDocument): Document;
  /** Cascades to the document's chunks */
  deleteDocument(id: number): { deleted: boolean; chunksDeleted: number };
  saveChunk(input: NewChunk): number;
  getChunksByDocument(documentId: number): DocumentChunk[];
  /** Every chunk, ordered by document then chunk index */
  getAllChunks(): SourcedChunk[];
  countChunks(documentId?: number): number;
}

export interface SQLiteVectorStoreOptions {
  /** Also write a JSON copy of each embedding (debugging only) */
  keepEmbeddingJson?: boolean;
  logger?: Logger;
  /** Clock for created_at/updated_at */
  now?: () => number;
}

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    fileName: row.file_name,
    filePath: row.file_path,
    displayName: row.display_name ?? row.file_name,
    fileHash: row.file_hash,
    fileSizeBytes: row.file_size_bytes,
    totalChunks: row.total_chunks,
    embeddingModel: row.embedding_model,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toChunk(row: ChunkRow): DocumentChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    chunkIndex: row.chunk_index,
    chunkText: row.chunk_text,
    embedding: blobToEmbedding(row.embedding_blob),
    tokenCount: row.token_count,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * better-sqlite3 implementation of {@link VectorStore}.
 *
 * Every method is one statement or one transaction, so each call is atomic
 * on its own; nothing spans a whole ingestion.
 *
 * @example
 * ```ts
 * const store = new SQLiteVectorStore(getDb());
 * const doc = store.createDocument({ fileName: 'a.md', ... });
 * store.saveChunk({ documentId: doc.id, chunkIndex: 0, ... });
 * ```
 */
export class SQLiteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly keepEmbeddingJson: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(db?: Database.Database, options: SQLiteVectorStoreOptions = {}) {
    this.db = db ?? getDb();
    this.keepEmbeddingJson = options.keepEmbeddingJson ?? false;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  findByHash(fileHash: string): Document | undefined {
    const row = this.db.prepare('SELECT * FROM documents WHERE file_hash = ?').get(fileHash);
    return row ? toDocument(validateRow(DocumentRowSchema, row, `documents.file_hash=${fileHash}`)) : undefined;
  }

  getDocument(id: number): Document | undefined {
    const row = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
    return row ? toDocument(validateRow(DocumentRowSchema, row, `documents.id=${id}`)) : undefined;
  }

  /**
   * All documents, newest first.
   */
  getAllDocuments(): Document[] {
    const rows = this.db.prepare('SELECT * FROM documents ORDER BY created_at DESC, id DESC').all();
    return validateRows(DocumentRowSchema, rows, 'documents').map(toDocument);
  }

  createDocument(input: NewDocument): Document {
    const timestamp = this.now();

    let result: Database.RunResult;
    try {
      result = this.db
        .prepare(
          `INSERT INTO documents (
             file_name, file_path, display_name, file_hash, file_size_bytes,
             total_chunks, embedding_model, created_at, updated_at
           ) VALUES (
             @fileName, @filePath, @displayName, @fileHash, @fileSizeBytes,
             @totalChunks, @embeddingModel, @createdAt, @updatedAt
           )`
        )
        .run({
          fileName: input.fileName,
          filePath: input.filePath,
          displayName: input.displayName ?? null,
          fileHash: input.fileHash,
          fileSizeBytes: input.fileSizeBytes,
          totalChunks: input.totalChunks,
          embeddingModel: input.embeddingModel,
          createdAt: timestamp,
          updatedAt: timestamp,
        });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateDocumentError(input.fileHash);
      }
      throw error;
    }

    const id = Number(result.lastInsertRowid);
    this.logger.debug?.(`Created document ${id} (${input.fileName}, ${input.totalChunks} chunks)`);

    const created = this.getDocument(id);
    if (!created) {
      throw new Error(`Document ${id} vanished right after insert`);
    }
    return created;
  }

  deleteDocument(id: number): { deleted: boolean; chunksDeleted: number } {
    return this.db.transaction(() => {
      const chunksDeleted = this.countChunks(id);
      const result = this.db.prepare('DELETE FROM documents WHERE id = ?').run(id);
      const deleted = result.changes > 0;
      if (deleted) {
        this.logger.debug?.(`Deleted document ${id} and ${chunksDeleted} chunks`);
      }
      return { deleted, chunksDeleted: deleted ? chunksDeleted : 0 };
    })();
  }

  saveChunk(input: NewChunk): number {
    const result = this.db
      .prepare(
        `INSERT INTO document_chunks (
           document_id, chunk_index, chunk_text, embedding_blob, embedding_json,
           token_count, created_at
         ) VALUES (
           @documentId, @chunkIndex, @chunkText, @embeddingBlob, @embeddingJson,
           @tokenCount, @createdAt
         )`
      )
      .run({
        documentId: input.documentId,
        chunkIndex: input.chunkIndex,
        chunkText: input.chunkText,
        embeddingBlob: embeddingToBlob(input.embedding),
        embeddingJson: this.keepEmbeddingJson ? JSON.stringify(Array.from(input.embedding)) : null,
        tokenCount: input.tokenCount,
        createdAt: this.now(),
      });
    return Number(result.lastInsertRowid);
  }

  getChunksByDocument(documentId: number): DocumentChunk[] {
    const rows = this.db
      .prepare(
        `SELECT id, document_id, chunk_index, chunk_text, embedding_blob, token_count, created_at
         FROM document_chunks WHERE document_id = ? ORDER BY chunk_index`
      )
      .all(documentId);
    return validateRows(ChunkRowSchema, rows, `document_chunks.document_id=${documentId}`).map(toChunk);
  }

  /**
   * Load every chunk in batches, ordered by (document_id, chunk_index).
   */
  getAllChunks(): SourcedChunk[] {
    const statement = this.db.prepare(
      `SELECT c.id, c.document_id, c.chunk_index, c.chunk_text, c.embedding_blob,
              c.token_count, c.created_at,
              COALESCE(d.display_name, d.file_name) AS document_name
       FROM document_chunks c
       JOIN documents d ON d.id = c.document_id
       ORDER BY c.document_id, c.chunk_index
       LIMIT ? OFFSET ?`
    );

    const chunks: SourcedChunk[] = [];
    for (let offset = 0; ; offset += LOAD_BATCH_SIZE) {
      const rows = statement.all(LOAD_BATCH_SIZE, offset);
      for (const row of validateRows(SourcedChunkRowSchema, rows, 'document_chunks')) {
        chunks.push({ ...toChunk(row), documentName: row.document_name });
      }
      if (rows.length < LOAD_BATCH_SIZE) {
        break;
      }
    }
    return chunks;
  }

  countChunks(documentId?: number): number {
    const row =
      documentId === undefined
        ? this.db.prepare('SELECT COUNT(*) AS count FROM document_chunks').get()
        : this.db
            .prepare('SELECT COUNT(*) AS count FROM document_chunks WHERE document_id = ?')
            .get(documentId);
    return validateRow(CountRowSchema, row, 'document_chunks.count').count;
  }
}

// ============================================================================
// Shared instance
// ============================================================================

let storeInstance: SQLiteVectorStore | null = null;

/**
 * Get the store bound to the shared connection.
 *
 * Options only apply on the first call.
 */
export function getDatabase(options: SQLiteVectorStoreOptions = {}): SQLiteVectorStore {
  if (!storeInstance) {
    storeInstance = new SQLiteVectorStore(getDb(), options);
  }
  return storeInstance;
}

/**
 * Migrate the shared connection and return its store.
 *
 * @throws DatabaseError if the database cannot be opened or a migration fails
 */
export function openStore(): SQLiteVectorStore {
  let result: MigrationResult;
  try {
    result = runMigrations();
  } catch (error) {
    throw new DatabaseError('Failed to open the document database', error);
  }

  const [failure] = result.failed;
  if (failure) {
    throw new DatabaseError(`Database migration ${failure.name} failed: ${failure.error}`);
  }
  return getDatabase();
}

/**
 * Reset the shared store. Primarily for testing.
 */
export function resetDatabase(): void {
  storeInstance = null;
}
