/**
 * Retrieval Engine
 *
 * Brute-force dense search over every stored chunk:
 * 1. Bulk-load chunks from the store
 * 2. Cosine-score each against the query embedding
 * 3. Optionally boost by query keyword overlap
 * 4. Drop anything under the class threshold (inclusive)
 * 5. Stable sort, then rerank and/or truncate to top K
 *
 * There is no ANN index; scoring is linear in the number of chunks.
 */

import type { Config } from '../config/schema.js';
import type { SourcedChunk, VectorStore } from '../database/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { applyLexicalBoost, extractKeywords, keywordMatchFraction } from './keywords.js';
import type { RerankerService } from './reranker.js';
import { cosineSimilarity, sortByScore } from './similarity.js';
import type { ContentClass, RetrievalSettings, ScoredChunk, SearchQuery } from './types.js';

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  topK: 5,
  maxTopK: 10,
  codeThreshold: 0.5,
  textThreshold: 0.65,
  lexicalBoost: true,
  rerankCandidates: 20,
  rerankEnabled: false,
};

export function retrievalSettingsFrom(config: Config): RetrievalSettings {
  return {
    topK: config.retrieval.top_k,
    maxTopK: config.retrieval.max_top_k,
    codeThreshold: config.retrieval.code_threshold,
    textThreshold: config.retrieval.text_threshold,
    lexicalBoost: config.retrieval.lexical_boost,
    rerankCandidates: config.retrieval.rerank_candidates,
    rerankEnabled: config.rerank.enabled,
  };
}

/**
 * Minimum (boosted) score for a query class. Untagged queries use the more
 * permissive of the two.
 */
export function thresholdFor(
  contentClass: ContentClass | undefined,
  settings: Pick<RetrievalSettings, 'codeThreshold' | 'textThreshold'>
): number {
  switch (contentClass) {
    case 'code':
      return settings.codeThreshold;
    case 'text':
      return settings.textThreshold;
    case undefined:
      return Math.min(settings.codeThreshold, settings.textThreshold);
  }
}

export function clampTopK(topK: number, maxTopK: number): number {
  return Math.min(Math.max(Math.floor(topK), 1), maxTopK);
}

function toScored(chunk: SourcedChunk, score: number): ScoredChunk {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    chunkIndex: chunk.chunkIndex,
    documentName: chunk.documentName,
    text: chunk.chunkText,
    tokenCount: chunk.tokenCount,
    score,
  };
}

export interface RetrievalEngineOptions {
  store: VectorStore;
  settings?: Partial<RetrievalSettings>;
  /** Without one, rerank requests are ignored */
  reranker?: RerankerService;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const engine = new RetrievalEngine({ store: getDatabase(), logger });
 * const results = await engine.search({
 *   queryEmbedding: await embedder.embed(model, query),
 *   queryText: query,
 *   contentClass: 'text',
 * });
 * ```
 */
export class RetrievalEngine {
  private readonly store: VectorStore;
  private readonly settings: RetrievalSettings;
  private readonly reranker?: RerankerService;
  private readonly logger: Logger;

  constructor(options: RetrievalEngineOptions) {
    this.store = options.store;
    this.settings = { ...DEFAULT_RETRIEVAL_SETTINGS, ...options.settings };
    this.reranker = options.reranker;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Ranked chunks for a query embedding. Never rejects: any failure is
   * logged and yields [].
   */
  async search(query: SearchQuery): Promise<ScoredChunk[]> {
    try {
      return await this.rank(query);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Search failed: ${message}`);
      return [];
    }
  }

  private async rank(query: SearchQuery): Promise<ScoredChunk[]> {
    const { settings } = this;
    const topK = clampTopK(query.topK ?? settings.topK, settings.maxTopK);

    const chunks = this.store.getAllChunks();
    if (chunks.length === 0) {
      this.logger.debug?.('No chunks stored; nothing to search');
      return [];
    }

    const keywords =
      settings.lexicalBoost && query.queryText ? extractKeywords(query.queryText) : [];

    const scored = chunks.map((chunk) => {
      let score = cosineSimilarity(query.queryEmbedding, chunk.embedding, this.logger);
      if (keywords.length > 0) {
        score = applyLexicalBoost(score, keywordMatchFraction(keywords, chunk.chunkText));
      }
      return toScored(chunk, score);
    });

    const threshold = thresholdFor(query.contentClass, settings);
    const candidates = sortByScore(scored.filter((chunk) => chunk.score >= threshold));
    this.logger.debug?.(
      `${candidates.length}/${chunks.length} chunks passed threshold ${threshold}`
    );

    const wantsRerank = query.rerank ?? settings.rerankEnabled;
    if (wantsRerank && this.reranker && query.queryText) {
      const reranked = await this.reranker.rerank(
        query.queryText,
        candidates.slice(0, settings.rerankCandidates),
        topK
      );
      return reranked.slice(0, topK);
    }

    return candidates.slice(0, topK);
  }
}
