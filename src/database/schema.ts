/**
 * Database Schema Types
 *
 * Domain shapes of the `documents` and `document_chunks` tables plus the
 * embedding BLOB codec.
 */

/**
 * An ingested file. `fileHash` (SHA-256 of the content) is the dedup key.
 */
export interface Document {
  id: number;
  fileName: string;
  filePath: string;
  /** Falls back to fileName when no display name was given */
  displayName: string;
  fileHash: string;
  fileSizeBytes: number;
  /** Chunk count fixed at creation */
  totalChunks: number;
  embeddingModel: string;
  /** Epoch millis */
  createdAt: number;
  updatedAt: number;
}

export interface NewDocument {
  fileName: string;
  filePath: string;
  displayName?: string;
  fileHash: string;
  fileSizeBytes: number;
  totalChunks: number;
  embeddingModel: string;
}

/**
 * A stored slice of a document with its embedding.
 */
export interface DocumentChunk {
  id: number;
  documentId: number;
  /** 0-based, unique per document */
  chunkIndex: number;
  chunkText: string;
  embedding: Float32Array;
  tokenCount: number;
  createdAt: number;
}

export interface NewChunk {
  documentId: number;
  chunkIndex: number;
  chunkText: string;
  embedding: ArrayLike<number>;
  tokenCount: number;
}

/**
 * A chunk loaded for ranking, carrying its document's display name.
 */
export interface SourcedChunk extends DocumentChunk {
  documentName: string;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Encode an embedding as little-endian float32 for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob([0.1, 0.2, 0.3]);
 * db.prepare('UPDATE document_chunks SET embedding_blob = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: ArrayLike<number>): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Decode a BLOB back into a Float32Array.
 *
 * Copies the bytes so the result is 4-byte aligned whatever the Buffer's offset.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = blob.buffer.slice(blob.byteOffset, blob.byteOffset + blob.byteLength);
  return new Float32Array(bytes);
}
