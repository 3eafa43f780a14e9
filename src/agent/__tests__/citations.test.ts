import { describe, it, expect } from 'vitest';
import { extractCitations, formatCitations } from '../citations.js';
import type { ScoredChunk } from '../../search/types.js';

function chunk(chunkId: number, documentName: string, score: number): ScoredChunk {
  return { chunkId, documentId: 1, chunkIndex: 0, documentName, text: '', tokenCount: 1, score };
}

describe('extractCitations', () => {
  it('finds plain and labelled references in order of first appearance', () => {
    const answer = 'Install it first [doc_12]. See also [doc_3 | FAQ] and again [doc_12].';

    expect(extractCitations(answer)).toEqual([12, 3]);
  });

  it('ignores text that only looks similar', () => {
    expect(extractCitations('No sources: doc_4, [doc_], [docs_5]')).toEqual([]);
  });
});

describe('formatCitations', () => {
  const chunks = [chunk(12, 'Setup guide', 0.923), chunk(3, 'FAQ', 0.71)];

  it('numbers cited chunks in citation order', () => {
    expect(formatCitations(chunks, [3, 12])).toBe('[1] FAQ [doc_3] (0.71)\n[2] Setup guide [doc_12] (0.92)');
  });

  it('skips unknown ids and can hide scores', () => {
    expect(formatCitations(chunks, [99, 12], { showScores: false })).toBe('[1] Setup guide [doc_12]');
  });
});
