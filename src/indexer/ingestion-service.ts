/**
 * Ingestion Service
 *
 * Runs each ingestion as an independent background task keyed by a request
 * id. Callers poll getProgress() or await waitFor(); listeners can also
 * subscribe to 'progress' and 'complete' events.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { ProgressTracker } from './progress.js';
import type { IngestOptions, IngestResult, Ingestor, ProgressSnapshot } from './types.js';
import { toCLIError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface IngestionServiceEvents {
  progress: [requestId: string, snapshot: ProgressSnapshot];
  complete: [requestId: string, result: IngestResult];
}

export type SubmitOptions = Omit<IngestOptions, 'onProgress'>;

/**
 * @example
 * ```ts
 * const service = new IngestionService(pipeline);
 * const id = service.submit('./guide.md');
 * service.on('progress', (_, p) => spinner.text = `${p.current}/${p.total}`);
 * const result = await service.waitFor(id);
 * ```
 */
export class IngestionService extends EventEmitter<IngestionServiceEvents> {
  private readonly tasks = new Map<string, Promise<IngestResult>>();

  constructor(
    private readonly ingestor: Ingestor,
    private readonly tracker: ProgressTracker = new ProgressTracker(),
    private readonly logger: Logger = silentLogger
  ) {
    super();
  }

  /**
   * Start ingesting a file in the background.
   *
   * @returns request id for getProgress()/waitFor()
   */
  submit(filePath: string, options: SubmitOptions = {}): string {
    this.prune();

    const requestId = randomUUID();
    this.tracker.start(requestId);
    this.logger.debug?.(`Ingestion ${requestId} started for ${filePath}`);

    const task = this.ingestor
      .ingest(filePath, {
        ...options,
        onProgress: (current, total) => {
          this.tracker.update(requestId, current, total);
          const snapshot = this.tracker.get(requestId);
          if (snapshot) {
            this.emit('progress', requestId, snapshot);
          }
        },
      })
      .catch((error: unknown): IngestResult => ({ success: false, error: toCLIError(error) }))
      .then((result) => {
        if (result.success) {
          this.tracker.complete(requestId);
        } else {
          this.tracker.fail(requestId, result.error.message);
        }
        this.logger.debug?.(`Ingestion ${requestId} ${result.success ? 'completed' : 'failed'}`);
        this.emit('complete', requestId, result);
        return result;
      });

    this.tasks.set(requestId, task);
    return requestId;
  }

  /**
   * Progress for a request, or undefined once it is unknown or expired.
   */
  getProgress(requestId: string): ProgressSnapshot | undefined {
    const snapshot = this.tracker.get(requestId);
    if (!snapshot) {
      this.tasks.delete(requestId);
    }
    return snapshot;
  }

  /**
   * Resolves with the request's result; undefined for unknown or expired ids.
   */
  async waitFor(requestId: string): Promise<IngestResult | undefined> {
    if (!this.getProgress(requestId)) {
      return undefined;
    }
    return this.tasks.get(requestId);
  }

  private prune(): void {
    for (const requestId of this.tracker.sweep()) {
      this.tasks.delete(requestId);
    }
  }
}
