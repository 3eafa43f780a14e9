/**
 * Reranker
 *
 * Best-effort second pass over the top vector-search candidates using a
 * cross-encoder. Any provider problem (error, timeout, malformed payload,
 * wrong score count, non-finite score) leaves the candidates exactly as
 * they were; reranking never fails a search.
 *
 * @example
 * ```typescript
 * const reranker = new RerankerService(
 *   new HuggingFaceRerankerProvider({ apiKey: process.env.RERANKER_API_KEY }),
 *   { threshold: 0.5 },
 *   logger
 * );
 * const reranked = await reranker.rerank(query, candidates, 5);
 * ```
 */

import { z } from 'zod';
import { RerankProviderError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sortByScore } from './similarity.js';
import type { ScoredChunk } from './types.js';

export const DEFAULT_RERANK_MODEL = 'BAAI/bge-reranker-v2-m3';
export const DEFAULT_RERANK_BASE_URL = 'https://router.huggingface.co/models';
export const DEFAULT_RERANK_THRESHOLD = 0.5;
export const DEFAULT_RERANK_TIMEOUT_MS = 30_000;

/**
 * Query + candidate texts → one relevance score per text, in order.
 */
export interface RerankerProvider {
  rerank(query: string, texts: string[]): Promise<number[]>;
}

// ============================================================================
// Hugging Face inference provider
// ============================================================================

export interface HuggingFaceRerankerOptions {
  model?: string;
  baseUrl?: string;
  /** Sent as a Bearer token when set */
  apiKey?: string;
  timeoutMs?: number;
}

const RerankResponseSchema = z.union([
  z.array(z.number()),
  z.object({ scores: z.array(z.number()) }),
  z.object({ error: z.string() }),
]);

export class HuggingFaceRerankerProvider implements RerankerProvider {
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: HuggingFaceRerankerOptions = {}) {
    const baseUrl = (options.baseUrl ?? DEFAULT_RERANK_BASE_URL).replace(/\/+$/, '');
    this.url = `${baseUrl}/${options.model ?? DEFAULT_RERANK_MODEL}`;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RERANK_TIMEOUT_MS;
  }

  async rerank(query: string, texts: string[]): Promise<number[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    let raw: string;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ inputs: { source_sentence: query, sentences: texts } }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      raw = await response.text();
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new RerankProviderError(`Reranker request failed: ${reason}`);
    }

    const parsed = RerankResponseSchema.safeParse(safeJsonParse(raw));

    if (!response.ok) {
      const detail = parsed.success && 'error' in parsed.data ? `: ${parsed.data.error}` : '';
      throw new RerankProviderError(`Reranker returned HTTP ${response.status}${detail}`);
    }
    if (!parsed.success) {
      throw new RerankProviderError('Reranker returned a malformed response');
    }

    const body = parsed.data;
    if (Array.isArray(body)) {
      return body;
    }
    if ('error' in body) {
      throw new RerankProviderError(`Reranker API error: ${body.error}`);
    }
    return body.scores;
  }
}

// ============================================================================
// Service
// ============================================================================

export interface RerankerServiceOptions {
  /** Minimum reranker score to keep a candidate */
  threshold?: number;
}

export class RerankerService {
  private readonly threshold: number;

  constructor(
    private readonly provider: RerankerProvider,
    options: RerankerServiceOptions = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.threshold = options.threshold ?? DEFAULT_RERANK_THRESHOLD;
  }

  /**
   * Re-score candidates, drop those under the threshold, sort and truncate.
   *
   * On any provider problem the candidates come back unchanged.
   */
  async rerank(query: string, candidates: ScoredChunk[], topK: number): Promise<ScoredChunk[]> {
    if (candidates.length === 0) {
      return [];
    }

    let scores: number[];
    try {
      scores = await this.provider.rerank(
        query,
        candidates.map((candidate) => candidate.text)
      );
    } catch (error) {
      return this.fallBack(candidates, error);
    }

    if (scores.length !== candidates.length) {
      return this.fallBack(
        candidates,
        new RerankProviderError(`Expected ${candidates.length} scores, got ${scores.length}`)
      );
    }
    if (!scores.every(Number.isFinite)) {
      return this.fallBack(candidates, new RerankProviderError('Reranker returned a non-finite score'));
    }

    const rescored = candidates.map((candidate, i) => ({ ...candidate, score: scores[i] ?? 0 }));
    const kept = sortByScore(rescored.filter((candidate) => candidate.score >= this.threshold));

    this.logger.debug?.(`Reranking kept ${kept.length}/${candidates.length} candidates`);
    return kept.slice(0, topK);
  }

  private fallBack(candidates: ScoredChunk[], error: unknown): ScoredChunk[] {
    const message =
      error instanceof RerankProviderError
        ? error.message
        : new RerankProviderError(error instanceof Error ? error.message : String(error)).message;
    this.logger.warn(`${message}; keeping vector scores`);
    return candidates;
  }
}
