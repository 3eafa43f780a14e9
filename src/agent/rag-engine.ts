/**
 * RAG Engine
 *
 * ```
 * query ──▶ embedding provider ──▶ RetrievalEngine ──▶ assembleContext
 *                                   (boost, threshold,    (token budget,
 *                                    rerank, top K)        [doc_<id>] tags)
 * ```
 *
 * Retrieval is best-effort end to end: an embedding failure or a failed
 * search yields an empty context, and augmentPrompt() then returns the
 * prompt untouched.
 *
 * @example
 * ```typescript
 * const rag = createRagEngine(config, getDatabase(), logger);
 * const { context, citedChunkIds } = await rag.retrieve('How do I install it?');
 * const prompt = await rag.augmentPrompt('How do I install it?');
 * ```
 */

import type { Config } from '../config/schema.js';
import type { VectorStore } from '../database/index.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../indexer/embedder/index.js';
import { createRetrievalEngine, type RetrievalEngine } from '../search/index.js';
import type { ScoredChunk } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { assembleContext, citationTag, DEFAULT_CONTEXT_TOKENS } from './assembler.js';
import type { RetrieveOptions, RetrieveResult } from './types.js';

/** Per-chunk text limit in formatSearchResults() */
export const RESULT_TEXT_LIMIT = 500;

const CONTEXT_INSTRUCTIONS =
  'Answer using only the context below. Cite the fragments you rely on as [doc_<id>].';

function emptyResult(): RetrieveResult {
  return { context: '', citedChunkIds: [], totalTokens: 0, results: [] };
}

export interface RagEngineOptions {
  embedder: EmbeddingProvider;
  embeddingModel: string;
  retrieval: RetrievalEngine;
  /** Default token budget for assembled context */
  contextTokens?: number;
  logger?: Logger;
}

export class RagEngine {
  private readonly embedder: EmbeddingProvider;
  private readonly embeddingModel: string;
  private readonly retrieval: RetrievalEngine;
  private readonly contextTokens: number;
  private readonly logger: Logger;

  constructor(options: RagEngineOptions) {
    this.embedder = options.embedder;
    this.embeddingModel = options.embeddingModel;
    this.retrieval = options.retrieval;
    this.contextTokens = options.contextTokens ?? DEFAULT_CONTEXT_TOKENS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Embed the query, search, and pack the results into a context block.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrieveResult> {
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embedder.embed(this.embeddingModel, query);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not embed query: ${message}`);
      return emptyResult();
    }

    const results = await this.retrieval.search({
      queryEmbedding,
      queryText: query,
      contentClass: options.contentClass,
      topK: options.topK,
      rerank: options.rerank,
    });

    const assembled = assembleContext(results, options.tokenBudget ?? this.contextTokens);
    this.logger.debug?.(
      `Context: ${assembled.citedChunkIds.length}/${results.length} chunks, ${assembled.totalTokens} tokens`
    );
    return { ...assembled, results };
  }

  /**
   * The prompt followed by a context section, or the prompt unchanged when
   * nothing relevant was found.
   */
  async augmentPrompt(prompt: string, options: RetrieveOptions = {}): Promise<string> {
    let context: string;
    try {
      ({ context } = await this.retrieve(prompt, options));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Retrieval failed, sending prompt without context: ${message}`);
      return prompt;
    }

    if (!context) {
      return prompt;
    }
    return `${prompt}\n\n${CONTEXT_INSTRUCTIONS}\n\nContext:\n${context}`;
  }
}

/**
 * Numbered listing for tool-style consumers; chunk text is cut at
 * RESULT_TEXT_LIMIT characters.
 */
export function formatSearchResults(results: readonly ScoredChunk[]): string {
  if (results.length === 0) {
    return 'No relevant documents found.';
  }

  const entries = results.map((result, i) => {
    const text =
      result.text.length > RESULT_TEXT_LIMIT ? `${result.text.slice(0, RESULT_TEXT_LIMIT)}...` : result.text;
    return `${i + 1}. ${citationTag(result)} (score: ${result.score.toFixed(3)})\n${text}`;
  });
  return `Found ${results.length} relevant chunk${results.length === 1 ? '' : 's'}:\n\n${entries.join('\n\n')}`;
}

export function createRagEngine(config: Config, store: VectorStore, logger?: Logger): RagEngine {
  return new RagEngine({
    embedder: createEmbeddingProvider(config, logger),
    embeddingModel: config.embedding.model,
    retrieval: createRetrievalEngine(config, store, logger),
    contextTokens: config.context.max_tokens,
    logger,
  });
}
