/**
 * Tests for search command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return { ...actual, createEmbeddingProvider: vi.fn() };
});

import { createSearchCommand } from '../search.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/index.js';
import { FakeEmbeddingProvider, type TempDir } from '../../../test-utils/fixtures.js';
import {
  FRUIT_TEXT,
  INSTALL_TEXT,
  createRecordingContext,
  jsonOutput,
  releaseTempHome,
  runCommand,
  seedDocuments,
  useTempHome,
} from './setup.js';

describe('createSearchCommand', () => {
  let home: TempDir;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    home = useTempHome();
    vi.mocked(createEmbeddingProvider).mockReturnValue(new FakeEmbeddingProvider());
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    seedDocuments([
      ['install.txt', INSTALL_TEXT],
      ['fruit.txt', FRUIT_TEXT],
    ]);
  });

  afterEach(() => {
    releaseTempHome(home);
    vi.restoreAllMocks();
  });

  describe('command structure', () => {
    it('has rerank toggles and a top-k option', () => {
      const cmd = createSearchCommand(() => createRecordingContext().ctx);
      const longs = cmd.options.map((opt) => opt.long);
      expect(longs).toEqual(['--top-k', '--class', '--rerank', '--no-rerank']);
    });
  });

  it('returns only chunks above the threshold', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createSearchCommand(() => ctx), ['search', FRUIT_TEXT]);

    expect(jsonOutput(consoleLogSpy)).toMatchObject({
      query: FRUIT_TEXT,
      count: 1,
      results: [{ chunkId: 2, documentId: 2, documentName: 'fruit.txt', content: FRUIT_TEXT }],
    });
  });

  it('renders human-readable results', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createSearchCommand(() => ctx), ['search', INSTALL_TEXT]);

    expect(logs[2]).toBe(`[1.50] install.txt [doc_1]\n  ${INSTALL_TEXT}`);
  });

  it('shows tips when nothing matches', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createSearchCommand(() => ctx), ['search', 'zzz']);

    expect(logs[0]).toContain('No results found for "zzz"');
  });

  it('rejects a top-k above retrieval.max_top_k', async () => {
    const { ctx } = createRecordingContext();

    await expect(
      runCommand(createSearchCommand(() => ctx), ['search', 'npm', '-k', '11'])
    ).rejects.toThrow('Invalid --top-k: 11');
  });

  it('rejects an unknown content class', async () => {
    const { ctx } = createRecordingContext();

    await expect(
      runCommand(createSearchCommand(() => ctx), ['search', 'npm', '--class', 'prose'])
    ).rejects.toThrow('Invalid --class: prose');
  });

  it('rejects a blank query', async () => {
    const { ctx } = createRecordingContext();

    await expect(runCommand(createSearchCommand(() => ctx), ['search', '   '])).rejects.toThrow(
      'Invalid query'
    );
  });
});
