/**
 * Chunker Configuration
 *
 * Chunk sizes, the token heuristic and the extension → strategy table.
 */

import type { Config } from '../../config/schema.js';
import { UnsupportedFileTypeError } from '../../errors/index.js';
import type { ChunkerConfig, ChunkingStrategy } from './types.js';

/**
 * 0.75 words per token is the usual figure for English prose with BPE
 * tokenizers. The same constant drives chunking, stored token counts,
 * context budgets and the embedding pre-flight check.
 */
export const DEFAULT_WORDS_PER_TOKEN = 0.75;

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  maxTokensPerChunk: 500,
  overlapTokens: 100,
  wordsPerToken: DEFAULT_WORDS_PER_TOKEN,
};

export const SUPPORTED_EXTENSIONS = ['txt', 'md', 'markdown'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const STRATEGIES: Record<SupportedExtension, ChunkingStrategy> = {
  txt: { kind: 'plain-text' },
  md: { kind: 'markdown' },
  markdown: { kind: 'markdown' },
};

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension);
}

/**
 * Pick the chunking strategy for a file extension ("md", ".MD", ...).
 *
 * @throws UnsupportedFileTypeError listing the supported extensions
 */
export function resolveStrategy(extension: string): ChunkingStrategy {
  const normalized = extension.replace(/^\./, '').toLowerCase();
  if (!isSupportedExtension(normalized)) {
    throw new UnsupportedFileTypeError(normalized, SUPPORTED_EXTENSIONS);
  }
  return STRATEGIES[normalized];
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Estimate tokens from words.
 *
 * Not tokenizer-accurate; good enough for packing and budget checks.
 */
export function estimateTokens(text: string, wordsPerToken = DEFAULT_WORDS_PER_TOKEN): number {
  return Math.floor(countWords(text) / wordsPerToken);
}

/**
 * Convert a token budget into a word budget.
 */
export function tokensToWords(tokens: number, wordsPerToken = DEFAULT_WORDS_PER_TOKEN): number {
  return Math.floor(tokens * wordsPerToken);
}

/**
 * Chunker settings from the [chunking] config section.
 */
export function chunkerConfigFrom(config: Config): ChunkerConfig {
  return {
    maxTokensPerChunk: config.chunking.max_tokens_per_chunk,
    overlapTokens: config.chunking.overlap_tokens,
    wordsPerToken: config.chunking.words_per_token,
  };
}
