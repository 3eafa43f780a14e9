/**
 * Ingestion Types
 */

import type { CLIError } from '../errors/index.js';

export interface IngestOptions {
  /** Name shown in citations and listings (defaults to the file name) */
  displayName?: string;
  /** Called after each chunk is embedded and saved */
  onProgress?: (current: number, total: number) => void;
}

/**
 * Outcome of one ingestion. Ingestion never throws; failures come back here.
 */
export type IngestResult =
  | { success: true; documentId: number; totalChunks: number }
  | { success: false; error: CLIError };

export type ProgressStatus = 'processing' | 'completed' | 'failed';

export interface ProgressSnapshot {
  current: number;
  total: number;
  /** floor(current / total * 100), or 0 before the total is known */
  percentage: number;
  status: ProgressStatus;
  error?: string;
}

/**
 * Anything that can ingest a single file. IngestionPipeline is the real one.
 */
export interface Ingestor {
  ingest(filePath: string, options?: IngestOptions): Promise<IngestResult>;
}
