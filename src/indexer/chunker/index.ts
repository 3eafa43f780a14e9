/**
 * Chunker Module
 *
 * Splits document text into ordered chunks. The strategy is chosen from the
 * file extension:
 *
 * ```ts
 * const chunks = splitDocument(content, 'md');
 * // [{ text: '# Intro\n\n...', tokenEstimate: 42, metadata: { headingPath: ['Intro'], ... } }]
 * ```
 */

import { extname } from 'node:path';
import { DEFAULT_CHUNKER_CONFIG, resolveStrategy } from './config.js';
import { chunkMarkdown } from './markdown.js';
import { chunkPlainText } from './plain-text.js';
import type { ChunkerConfig, ChunkingStrategy, TextChunk } from './types.js';

/**
 * Run a strategy over the content. Deterministic for fixed input and config.
 */
export function chunkWith(
  strategy: ChunkingStrategy,
  content: string,
  config: ChunkerConfig = DEFAULT_CHUNKER_CONFIG
): TextChunk[] {
  switch (strategy.kind) {
    case 'plain-text':
      return chunkPlainText(content, config);
    case 'markdown':
      return chunkMarkdown(content, config);
    default: {
      const unhandled: never = strategy;
      throw new Error(`Unhandled chunking strategy: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Split content using the strategy for `extension`.
 *
 * @throws UnsupportedFileTypeError for anything but .txt, .md and .markdown
 */
export function splitDocument(
  content: string,
  extension: string,
  config: ChunkerConfig = DEFAULT_CHUNKER_CONFIG
): TextChunk[] {
  return chunkWith(resolveStrategy(extension), content, config);
}

/**
 * Extension of a path without the dot ("notes.MD" → "MD").
 */
export function extensionOf(filePath: string): string {
  return extname(filePath).replace(/^\./, '');
}

export {
  DEFAULT_CHUNKER_CONFIG,
  DEFAULT_WORDS_PER_TOKEN,
  SUPPORTED_EXTENSIONS,
  chunkerConfigFrom,
  countWords,
  estimateTokens,
  resolveStrategy,
  tokensToWords,
  type SupportedExtension,
} from './config.js';

export type { ChunkMetadata, ChunkerConfig, ChunkingStrategy, TextChunk } from './types.js';
