/**
 * RAG Module
 *
 * Query → embed → search → token-budgeted, citation-tagged context.
 */

export {
  assembleContext,
  citationTag,
  DEFAULT_CONTEXT_TOKENS,
  TokenBudgetSchema,
} from './assembler.js';

export { extractCitations, formatCitations, type CitationFormatOptions } from './citations.js';

export {
  RagEngine,
  createRagEngine,
  formatSearchResults,
  RESULT_TEXT_LIMIT,
  type RagEngineOptions,
} from './rag-engine.js';

export type { AssembledContext, RetrieveOptions, RetrieveResult } from './types.js';
