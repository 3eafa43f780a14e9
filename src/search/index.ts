/**
 * Search Module
 *
 * Dense retrieval with lexical boost, adaptive thresholds and optional
 * cross-encoder reranking.
 *
 * @example
 * ```typescript
 * import { createRetrievalEngine } from './search/index.js';
 *
 * const engine = createRetrievalEngine(config, getDatabase(), logger);
 * const results = await engine.search({ queryEmbedding, queryText: 'install steps' });
 * ```
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import type { VectorStore } from '../database/index.js';
import type { Logger } from '../utils/logger.js';
import { HuggingFaceRerankerProvider, RerankerService } from './reranker.js';
import { RetrievalEngine, retrievalSettingsFrom } from './retriever.js';

export {
  RetrievalEngine,
  DEFAULT_RETRIEVAL_SETTINGS,
  retrievalSettingsFrom,
  thresholdFor,
  clampTopK,
  type RetrievalEngineOptions,
} from './retriever.js';

export {
  RerankerService,
  HuggingFaceRerankerProvider,
  DEFAULT_RERANK_MODEL,
  DEFAULT_RERANK_BASE_URL,
  DEFAULT_RERANK_THRESHOLD,
  DEFAULT_RERANK_TIMEOUT_MS,
  type RerankerProvider,
  type RerankerServiceOptions,
  type HuggingFaceRerankerOptions,
} from './reranker.js';

export { cosineSimilarity, sortByScore } from './similarity.js';
export {
  extractKeywords,
  keywordMatchFraction,
  applyLexicalBoost,
  LEXICAL_BOOST_WEIGHT,
} from './keywords.js';

export {
  formatScore,
  truncateSnippet,
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
} from './formatter.js';

export type {
  ContentClass,
  ScoredChunk,
  SearchQuery,
  RetrievalSettings,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';

/**
 * Reranker from the [rerank] config section and RERANKER_API_KEY.
 */
export function createReranker(config: Config, logger?: Logger): RerankerService {
  const provider = new HuggingFaceRerankerProvider({
    model: config.rerank.model,
    baseUrl: config.rerank.base_url,
    apiKey: getEnv('RERANKER_API_KEY'),
    timeoutMs: config.rerank.timeout_ms,
  });
  return new RerankerService(provider, { threshold: config.rerank.threshold }, logger);
}

/**
 * Retrieval engine wired from config, with the reranker attached.
 */
export function createRetrievalEngine(config: Config, store: VectorStore, logger?: Logger): RetrievalEngine {
  return new RetrievalEngine({
    store,
    settings: retrievalSettingsFrom(config),
    reranker: createReranker(config, logger),
    logger,
  });
}
