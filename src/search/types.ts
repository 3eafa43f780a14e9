/**
 * Search Module Types
 */

/**
 * Query class. Code-like queries get a looser similarity threshold than
 * prose; untagged queries use the looser of the two.
 */
export type ContentClass = 'code' | 'text';

/**
 * A stored chunk scored against a query.
 */
export interface ScoredChunk {
  chunkId: number;
  documentId: number;
  chunkIndex: number;
  /** Owning document's display name */
  documentName: string;
  text: string;
  tokenCount: number;
  score: number;
}

export interface SearchQuery {
  queryEmbedding: ArrayLike<number>;
  /** Enables the lexical boost and reranking */
  queryText?: string;
  contentClass?: ContentClass;
  /** Clamped to [1, maxTopK] */
  topK?: number;
  /** Overrides the configured rerank setting for this call */
  rerank?: boolean;
}

/**
 * Retrieval settings, mirroring the [retrieval] config section.
 */
export interface RetrievalSettings {
  topK: number;
  maxTopK: number;
  codeThreshold: number;
  textThreshold: number;
  lexicalBoost: boolean;
  rerankCandidates: number;
  /** Default for SearchQuery.rerank */
  rerankEnabled: boolean;
}

export interface FormatOptions {
  /** Maximum snippet length in characters (default: 200) */
  snippetLength?: number;
  /** Show the [0.92] score prefix (default: true) */
  showScore?: boolean;
}

export interface FormattedResultJSON {
  score: number;
  chunkId: number;
  documentId: number;
  documentName: string;
  chunkIndex: number;
  tokenCount: number;
  content: string;
}
