/**
 * Database Module
 *
 * SQLite storage for documents and their embedded chunks.
 *
 * @example
 * ```ts
 * import { openStore } from './database/index.js';
 *
 * const store = openStore();
 * const documents = store.getAllDocuments();
 * ```
 */

export { getDb, closeDb, openDatabase } from './connection.js';

export {
  runMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

export type {
  Document,
  NewDocument,
  DocumentChunk,
  NewChunk,
  SourcedChunk,
} from './schema.js';

export { embeddingToBlob, blobToEmbedding } from './schema.js';

export {
  DocumentRowSchema,
  ChunkRowSchema,
  type DocumentRow,
  type ChunkRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

export {
  getDatabase,
  openStore,
  resetDatabase,
  SQLiteVectorStore,
  type VectorStore,
  type SQLiteVectorStoreOptions,
} from './vector-store.js';
