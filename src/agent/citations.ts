/**
 * Citations
 *
 * Parses [doc_<id>] references out of a model answer and renders the
 * matching chunks as a numbered source list for the terminal.
 *
 * @example
 * ```typescript
 * const cited = extractCitations('Run the installer [doc_12].');
 * console.log(formatCitations(result.results, cited));
 * // [1] Setup guide [doc_12] (0.92)
 * ```
 */

import { formatScore } from '../search/formatter.js';
import type { ScoredChunk } from '../search/types.js';

/** [doc_12] or [doc_12 | Setup guide] */
const CITATION_PATTERN = /\[doc_(\d+)(?:\s*\|[^\]]*)?\]/g;

/**
 * Unique cited chunk ids, in order of first appearance.
 */
export function extractCitations(answer: string): number[] {
  const ids: number[] = [];
  for (const match of answer.matchAll(CITATION_PATTERN)) {
    const id = Number(match[1]);
    if (!ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

export interface CitationFormatOptions {
  /** Show relevance scores (default: true) */
  showScores?: boolean;
}

/**
 * Numbered list of the chunks whose ids appear in `cited`, in citation
 * order. Ids with no matching chunk are skipped.
 */
export function formatCitations(
  chunks: readonly ScoredChunk[],
  cited: readonly number[],
  options: CitationFormatOptions = {}
): string {
  const { showScores = true } = options;
  const byId = new Map(chunks.map((chunk) => [chunk.chunkId, chunk]));

  const lines: string[] = [];
  for (const id of cited) {
    const chunk = byId.get(id);
    if (!chunk) continue;
    const score = showScores ? ` (${formatScore(chunk.score)})` : '';
    lines.push(`[${lines.length + 1}] ${chunk.documentName} [doc_${id}]${score}`);
  }
  return lines.join('\n');
}
