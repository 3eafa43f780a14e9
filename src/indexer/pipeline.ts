/**
 * Ingestion Pipeline
 *
 * Validate → hash/dedup → chunk → create document → embed + save each chunk.
 *
 * A document and its chunks are one unit: if any chunk fails to embed or
 * save, the document row is deleted (cascading to the chunks already saved)
 * and the failure is returned. No single transaction spans the provider
 * calls; rollback is a compensating delete.
 */

import { createHash } from 'node:crypto';
import { access, readFile, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import { basename, resolve } from 'node:path';

import {
  chunkWith,
  DEFAULT_CHUNKER_CONFIG,
  extensionOf,
  resolveStrategy,
  type ChunkerConfig,
  type ChunkingStrategy,
  type TextChunk,
} from './chunker/index.js';
import type { EmbeddingProvider } from './embedder/index.js';
import type { IngestOptions, IngestResult, Ingestor } from './types.js';
import type { Document, NewDocument, VectorStore } from '../database/index.js';
import {
  DuplicateDocumentError,
  EmbeddingProviderError,
  EmptyFileError,
  FileNotFoundError,
  FileTooLargeError,
  UnreadableFileError,
  toCLIError,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export interface IngestionPipelineOptions {
  store: VectorStore;
  embedder: EmbeddingProvider;
  /** Model name passed to the provider and recorded on the document */
  embeddingModel: string;
  chunker?: ChunkerConfig;
  maxFileSizeBytes?: number;
  logger?: Logger;
}

interface ValidatedFile {
  path: string;
  content: string;
  bytes: Buffer;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorReason(error: unknown): string {
  return errorCode(error) ?? (error instanceof Error ? error.message : String(error));
}

/**
 * Turns one text or markdown file into a stored, embedded document.
 *
 * @example
 * ```ts
 * const pipeline = new IngestionPipeline({
 *   store: getDatabase(),
 *   embedder: createEmbeddingProvider(config),
 *   embeddingModel: config.embedding.model,
 * });
 * const result = await pipeline.ingest('./notes/setup.md');
 * if (result.success) console.log(result.documentId);
 * ```
 */
export class IngestionPipeline implements Ingestor {
  private readonly store: VectorStore;
  private readonly embedder: EmbeddingProvider;
  private readonly embeddingModel: string;
  private readonly chunker: ChunkerConfig;
  private readonly maxFileSizeBytes: number;
  private readonly logger: Logger;

  constructor(options: IngestionPipelineOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.embeddingModel = options.embeddingModel;
    this.chunker = options.chunker ?? DEFAULT_CHUNKER_CONFIG;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.logger = options.logger ?? silentLogger;
  }

  async ingest(filePath: string, options: IngestOptions = {}): Promise<IngestResult> {
    try {
      return await this.run(filePath, options);
    } catch (error) {
      const cliError = toCLIError(error);
      this.logger.warn(`Ingestion of ${filePath} failed: ${cliError.message}`);
      return { success: false, error: cliError };
    }
  }

  private async run(filePath: string, options: IngestOptions): Promise<IngestResult> {
    const file = await this.readValidated(filePath);
    // Resolved before anything is deleted, so an unsupported file can't
    // remove an existing document
    const strategy = resolveStrategy(extensionOf(file.path));

    const fileHash = createHash('sha256').update(file.bytes).digest('hex');
    const existing = this.store.findByHash(fileHash);
    if (existing) {
      this.logger.info?.(`Replacing document ${existing.id} (same content as ${file.path})`);
      this.store.deleteDocument(existing.id);
    }

    const chunks = this.split(strategy, file);

    const document = this.createDocument({
      fileName: basename(file.path),
      filePath: file.path,
      displayName: options.displayName,
      fileHash,
      fileSizeBytes: file.bytes.length,
      totalChunks: chunks.length,
      embeddingModel: this.embeddingModel,
    });

    try {
      await this.embedAndSave(document, chunks, options.onProgress);
    } catch (error) {
      const { chunksDeleted } = this.store.deleteDocument(document.id);
      this.logger.debug?.(`Rolled back document ${document.id} (${chunksDeleted} chunks removed)`);
      throw error;
    }

    this.logger.debug?.(`Ingested ${file.path} as document ${document.id} (${chunks.length} chunks)`);
    return { success: true, documentId: document.id, totalChunks: chunks.length };
  }

  /**
   * Checks run in a fixed order: exists, readable, size, non-empty.
   */
  private async readValidated(filePath: string): Promise<ValidatedFile> {
    const path = resolve(filePath);

    let size: number;
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        throw new UnreadableFileError(path, 'not a regular file');
      }
      size = stats.size;
    } catch (error) {
      if (error instanceof UnreadableFileError) throw error;
      if (errorCode(error) === 'ENOENT') throw new FileNotFoundError(path);
      throw new UnreadableFileError(path, errorReason(error));
    }

    try {
      await access(path, constants.R_OK);
    } catch (error) {
      throw new UnreadableFileError(path, errorReason(error));
    }

    if (size > this.maxFileSizeBytes) {
      throw new FileTooLargeError(path, size, this.maxFileSizeBytes);
    }
    if (size === 0) {
      throw new EmptyFileError(path);
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new UnreadableFileError(path, errorReason(error));
    }

    const content = bytes.toString('utf8');
    if (content.trim() === '') {
      throw new EmptyFileError(path);
    }

    return { path, content, bytes };
  }

  private split(strategy: ChunkingStrategy, file: ValidatedFile): TextChunk[] {
    const chunks = chunkWith(strategy, file.content, this.chunker);
    if (chunks.length === 0) {
      throw new EmptyFileError(file.path);
    }
    return chunks;
  }

  /**
   * Insert the document row. A concurrent ingestion of the same content may
   * have inserted it between our lookup and this insert; replace it once.
   */
  private createDocument(input: NewDocument): Document {
    try {
      return this.store.createDocument(input);
    } catch (error) {
      if (!(error instanceof DuplicateDocumentError)) {
        throw error;
      }
      const conflicting = this.store.findByHash(input.fileHash);
      if (conflicting) {
        this.logger.info?.(`Document ${conflicting.id} was ingested concurrently; replacing it`);
        this.store.deleteDocument(conflicting.id);
      }
      return this.store.createDocument(input);
    }
  }

  private async embedAndSave(
    document: Document,
    chunks: TextChunk[],
    onProgress: IngestOptions['onProgress']
  ): Promise<void> {
    const total = chunks.length;
    let dimensions: number | undefined;
    for (const [index, chunk] of chunks.entries()) {
      const embedding = await this.embedder.embed(this.embeddingModel, chunk.text);
      // Every chunk of a document shares the first chunk's dimension
      if (dimensions === undefined) dimensions = embedding.length;
      if (embedding.length !== dimensions) {
        throw new EmbeddingProviderError(
          'invalid_response',
          `Embedding for chunk ${index} has ${embedding.length} dimensions, expected ${dimensions}`
        );
      }
      this.store.saveChunk({
        documentId: document.id,
        chunkIndex: index,
        chunkText: chunk.text,
        embedding,
        tokenCount: chunk.tokenEstimate,
      });
      onProgress?.(index + 1, total);
    }
  }
}
