/**
 * Search Result Formatter
 *
 * Human-readable and JSON renderings of ranked chunks for the CLI.
 *
 * @example
 * ```typescript
 * formatResult(result);
 * // [0.92] Setup guide [doc_12]
 * //   Install the CLI with npm and run the first ingestion...
 * ```
 */

import type { FormatOptions, FormattedResultJSON, ScoredChunk } from './types.js';

const DEFAULT_SNIPPET_LENGTH = 200;

const SNIPPET_INDENT = '  ';

/**
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace to single spaces and cut to `maxLength` with "...".
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return normalized.slice(0, maxLength) + '...';
}

export function formatResult(result: ScoredChunk, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }
  parts.push(result.documentName, `[doc_${result.chunkId}]`);

  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(result.text, snippetLength)}`;
}

/**
 * Results separated by blank lines; '' for no results.
 */
export function formatResults(results: ScoredChunk[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

export function formatResultJSON(result: ScoredChunk): FormattedResultJSON {
  return {
    score: result.score,
    chunkId: result.chunkId,
    documentId: result.documentId,
    documentName: result.documentName,
    chunkIndex: result.chunkIndex,
    tokenCount: result.tokenCount,
    content: result.text,
  };
}

export function formatResultsJSON(results: ScoredChunk[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
