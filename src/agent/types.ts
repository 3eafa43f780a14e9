/**
 * RAG Types
 */

import type { ContentClass, ScoredChunk } from '../search/types.js';

export interface AssembledContext {
  /** Citation-tagged blocks joined by blank lines; '' when nothing fit */
  context: string;
  /** Chunk ids included, in rank order */
  citedChunkIds: number[];
  totalTokens: number;
}

export interface RetrieveOptions {
  contentClass?: ContentClass;
  topK?: number;
  rerank?: boolean;
  /** Context token budget (defaults to context.max_tokens) */
  tokenBudget?: number;
}

export interface RetrieveResult extends AssembledContext {
  /** Everything the search returned, including chunks the budget cut */
  results: ScoredChunk[];
}
