/**
 * Paragraph splitting and greedy packing shared by both strategies.
 */

import { countWords } from './config.js';
import type { Paragraph } from './types.js';

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

/**
 * Split text on a separator, keeping the source line of every paragraph.
 *
 * @param separator - Newline-only pattern (e.g. /\n+/ or /\n{2,}/)
 * @param firstLine - Line number of the first character of `text`
 */
export function splitParagraphs(text: string, separator: RegExp, firstLine = 1): Paragraph[] {
  const paragraphs: Paragraph[] = [];
  const pattern = new RegExp(separator.source, 'g');
  let line = firstLine;
  let last = 0;

  const take = (part: string, partLine: number): void => {
    const trimmed = part.trim();
    if (!trimmed) return;
    const leading = part.slice(0, part.length - part.trimStart().length);
    paragraphs.push({
      text: trimmed,
      words: countWords(trimmed),
      line: partLine + countNewlines(leading),
    });
  };

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? last;
    const part = text.slice(last, index);
    take(part, line);
    line += countNewlines(part) + countNewlines(match[0]);
    last = index + match[0].length;
  }
  take(text.slice(last), line);

  return paragraphs;
}

/**
 * Trailing paragraphs whose combined words fit the overlap budget.
 */
export function trailingOverlap(paragraphs: readonly Paragraph[], overlapWords: number): Paragraph[] {
  const overlap: Paragraph[] = [];
  let words = 0;
  for (let i = paragraphs.length - 1; i >= 0; i--) {
    const paragraph = paragraphs[i];
    if (paragraph === undefined || words + paragraph.words > overlapWords) break;
    overlap.unshift(paragraph);
    words += paragraph.words;
  }
  return overlap;
}

/**
 * Greedily group paragraphs so each group stays within `budgetWords`.
 *
 * When `overlapWords` > 0 every group after the first starts with the
 * trailing paragraphs of the previous group. A paragraph larger than the
 * budget still gets a group of its own.
 */
export function packParagraphs(
  paragraphs: readonly Paragraph[],
  budgetWords: number,
  overlapWords = 0
): Paragraph[][] {
  const groups: Paragraph[][] = [];
  let current: Paragraph[] = [];
  let words = 0;

  for (const paragraph of paragraphs) {
    if (current.length > 0 && words + paragraph.words > budgetWords) {
      groups.push(current);
      current = trailingOverlap(current, overlapWords);
      words = current.reduce((sum, p) => sum + p.words, 0);
    }
    current.push(paragraph);
    words += paragraph.words;
  }

  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}
