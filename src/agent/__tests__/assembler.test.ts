import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { assembleContext, citationTag } from '../assembler.js';
import type { ScoredChunk } from '../../search/types.js';

function chunk(chunkId: number, tokenCount: number, text = `text ${chunkId}`): ScoredChunk {
  return { chunkId, documentId: 1, chunkIndex: chunkId, documentName: 'guide.md', text, tokenCount, score: 0.9 };
}

describe('assembleContext', () => {
  it('accepts chunks while they fit and stops at the first overflow', () => {
    const result = assembleContext([chunk(1, 400), chunk(2, 500), chunk(3, 300)], 900);

    expect(result.citedChunkIds).toEqual([1, 2]);
    expect(result.totalTokens).toBe(900);
  });

  it('does not backfill smaller chunks after an overflow', () => {
    const result = assembleContext([chunk(1, 400), chunk(2, 600), chunk(3, 100)], 900);

    expect(result.citedChunkIds).toEqual([1]);
    expect(result.totalTokens).toBe(400);
  });

  it('renders citation-tagged blocks separated by blank lines', () => {
    const result = assembleContext([chunk(7, 10, 'First fragment.'), chunk(9, 10, 'Second\nfragment.')]);

    expect(result.context).toBe('[doc_7 | guide.md]\nFirst fragment.\n\n[doc_9 | guide.md]\nSecond\nfragment.');
  });

  it('returns an empty context when the first chunk is too large', () => {
    expect(assembleContext([chunk(1, 2001)])).toEqual({ context: '', citedChunkIds: [], totalTokens: 0 });
    expect(assembleContext([], 100)).toEqual({ context: '', citedChunkIds: [], totalTokens: 0 });
  });

  it('rejects a negative budget', () => {
    expect(() => assembleContext([chunk(1, 1)], -1)).toThrow(ZodError);
  });
});

describe('citationTag', () => {
  it('names the chunk id and source', () => {
    expect(citationTag({ chunkId: 3, documentName: 'FAQ' })).toBe('[doc_3 | FAQ]');
  });
});
