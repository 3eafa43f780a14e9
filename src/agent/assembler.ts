/**
 * Context Assembler
 *
 * Packs ranked chunks into a token budget and renders each one with a
 * citation tag the model can quote back:
 *
 * ```
 * [doc_12 | Setup guide]
 * Install the CLI with npm...
 *
 * [doc_40 | FAQ]
 * ...
 * ```
 *
 * Packing is greedy in rank order and stops at the first chunk that would
 * overflow: no backfill with smaller chunks, no partial chunks.
 */

import { z } from 'zod';
import type { ScoredChunk } from '../search/types.js';
import type { AssembledContext } from './types.js';

export const DEFAULT_CONTEXT_TOKENS = 2000;

export const TokenBudgetSchema = z
  .number()
  .int('token budget must be an integer')
  .nonnegative('token budget cannot be negative');

export function citationTag(chunk: Pick<ScoredChunk, 'chunkId' | 'documentName'>): string {
  return `[doc_${chunk.chunkId} | ${chunk.documentName}]`;
}

/**
 * @throws ZodError for a negative or fractional budget
 */
export function assembleContext(
  ranked: readonly ScoredChunk[],
  tokenBudget: number = DEFAULT_CONTEXT_TOKENS
): AssembledContext {
  const budget = TokenBudgetSchema.parse(tokenBudget);

  const blocks: string[] = [];
  const citedChunkIds: number[] = [];
  let totalTokens = 0;

  for (const chunk of ranked) {
    if (totalTokens + chunk.tokenCount > budget) {
      break;
    }
    blocks.push(`${citationTag(chunk)}\n${chunk.text}`);
    citedChunkIds.push(chunk.chunkId);
    totalTokens += chunk.tokenCount;
  }

  return { context: blocks.join('\n\n'), citedChunkIds, totalTokens };
}
