/**
 * Indexer Module
 *
 * Chunking, embedding and ingestion of text and markdown files.
 *
 * @example
 * ```ts
 * import { IngestionPipeline, IngestionService } from './indexer/index.js';
 *
 * const service = new IngestionService(new IngestionPipeline({ store, embedder, embeddingModel }));
 * const requestId = service.submit('./docs/guide.md', { displayName: 'Guide' });
 * console.log(service.getProgress(requestId));
 * ```
 */

import type { Config } from '../config/schema.js';
import type { VectorStore } from '../database/index.js';
import type { Logger } from '../utils/logger.js';
import { chunkerConfigFrom } from './chunker/index.js';
import { createEmbeddingProvider } from './embedder/index.js';
import { IngestionPipeline } from './pipeline.js';
import { IngestionService } from './ingestion-service.js';
import { ProgressTracker } from './progress.js';

export * from './chunker/index.js';
export * from './embedder/index.js';

export { IngestionPipeline, DEFAULT_MAX_FILE_SIZE_BYTES, type IngestionPipelineOptions } from './pipeline.js';
export { IngestionService, type IngestionServiceEvents, type SubmitOptions } from './ingestion-service.js';
export {
  ProgressTracker,
  percentageOf,
  DEFAULT_PROGRESS_RETENTION_MS,
  type ProgressTrackerOptions,
} from './progress.js';
export type {
  IngestOptions,
  IngestResult,
  Ingestor,
  ProgressSnapshot,
  ProgressStatus,
} from './types.js';

/**
 * Pipeline wired from config: Ollama embeddings, configured chunk sizes and
 * file size limit.
 */
export function createIngestionPipeline(config: Config, store: VectorStore, logger?: Logger): IngestionPipeline {
  return new IngestionPipeline({
    store,
    embedder: createEmbeddingProvider(config, logger),
    embeddingModel: config.embedding.model,
    chunker: chunkerConfigFrom(config),
    maxFileSizeBytes: config.ingestion.max_file_size_bytes,
    logger,
  });
}

export function createIngestionService(config: Config, store: VectorStore, logger?: Logger): IngestionService {
  return new IngestionService(
    createIngestionPipeline(config, store, logger),
    new ProgressTracker({ retentionMs: config.ingestion.progress_retention_ms }),
    logger
  );
}
