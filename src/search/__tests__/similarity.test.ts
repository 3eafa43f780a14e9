import { describe, it, expect, vi } from 'vitest';
import { cosineSimilarity, sortByScore } from '../similarity.js';

describe('cosineSimilarity', () => {
  it('scores identical, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('accepts Float32Array input', () => {
    expect(cosineSimilarity(new Float32Array([3, 4]), [1, 0])).toBe(0.6);
  });

  it('scores a dimension mismatch as 0 and warns', () => {
    const warn = vi.fn();

    expect(cosineSimilarity([1, 2, 3], [1, 2], { warn })).toBe(0);
    expect(warn).toHaveBeenCalledWith('Vector dimension mismatch: 3 vs 2');
  });

  it('scores a zero vector as 0 and warns', () => {
    const warn = vi.fn();

    expect(cosineSimilarity([0, 0], [1, 1], { warn })).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('sortByScore', () => {
  it('sorts descending and keeps ties in input order', () => {
    const items = [
      { id: 'a', score: 0.5 },
      { id: 'b', score: 0.9 },
      { id: 'c', score: 0.5 },
      { id: 'd', score: 0.7 },
    ];

    expect(sortByScore(items).map((i) => i.id)).toEqual(['b', 'd', 'a', 'c']);
    expect(items.map((i) => i.id)).toEqual(['a', 'b', 'c', 'd']);
  });
});
