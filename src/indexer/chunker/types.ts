/**
 * Chunker Types
 */

/**
 * Structural position of a chunk in its source document.
 */
export interface ChunkMetadata {
  /** Enclosing heading titles, outermost first (empty for plain text) */
  headingPath: string[];
  /** 0 = body text, 1-6 = heading depth of the enclosing section */
  level: number;
  /** 1-indexed line where the chunk text starts */
  startLine: number;
}

/**
 * A chunk ready for embedding.
 */
export interface TextChunk {
  text: string;
  /** Word-count heuristic, see estimateTokens() */
  tokenEstimate: number;
  metadata: ChunkMetadata;
}

export interface ChunkerConfig {
  /** Packing limit per chunk, in estimated tokens */
  maxTokensPerChunk: number;
  /** Size of the sliding-window overlap, in estimated tokens */
  overlapTokens: number;
  /** tokens = floor(words / wordsPerToken) */
  wordsPerToken: number;
}

/**
 * Supported chunking strategies.
 */
export type ChunkingStrategy = { kind: 'plain-text' } | { kind: 'markdown' };

/**
 * A paragraph with its word count and 1-indexed source line.
 */
export interface Paragraph {
  text: string;
  words: number;
  line: number;
}
