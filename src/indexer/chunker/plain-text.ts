/**
 * Plain-text strategy
 *
 * Paragraphs are newline-separated runs of text. They are packed greedily
 * into chunks, and each chunk after the first is re-seeded with the
 * trailing paragraphs of the previous one (sliding-window overlap).
 */

import { estimateTokens, tokensToWords } from './config.js';
import { packParagraphs, splitParagraphs } from './paragraphs.js';
import type { ChunkerConfig, TextChunk } from './types.js';

export function chunkPlainText(content: string, config: ChunkerConfig): TextChunk[] {
  const { maxTokensPerChunk, overlapTokens, wordsPerToken } = config;
  const paragraphs = splitParagraphs(content.replace(/\r\n?/g, '\n'), /\n+/);

  const groups = packParagraphs(
    paragraphs,
    tokensToWords(maxTokensPerChunk, wordsPerToken),
    tokensToWords(overlapTokens, wordsPerToken)
  );

  return groups.map((group) => {
    const text = group.map((p) => p.text).join('\n');
    return {
      text,
      tokenEstimate: estimateTokens(text, wordsPerToken),
      metadata: {
        headingPath: [],
        level: 0,
        startLine: group[0]?.line ?? 1,
      },
    };
  });
}
