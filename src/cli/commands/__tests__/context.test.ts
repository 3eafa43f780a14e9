/**
 * Tests for context command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return { ...actual, createEmbeddingProvider: vi.fn() };
});

import { createContextCommand } from '../context.js';
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

describe('createContextCommand', () => {
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

  it('prints tagged context with cited ids as JSON', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createContextCommand(() => ctx), ['context', INSTALL_TEXT]);

    expect(jsonOutput(consoleLogSpy)).toEqual({
      query: INSTALL_TEXT,
      context: `[doc_1 | install.txt]\n${INSTALL_TEXT}`,
      citedChunkIds: [1],
      totalTokens: 12,
    });
  });

  it('lists sources after the context', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createContextCommand(() => ctx), ['context', INSTALL_TEXT]);

    expect(logs[0]).toBe(`[doc_1 | install.txt]\n${INSTALL_TEXT}`);
    expect(logs[3]).toBe('[1] install.txt [doc_1]');
  });

  it('leaves the context empty when the budget is too small', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createContextCommand(() => ctx), ['context', INSTALL_TEXT, '--budget', '5']);

    expect(jsonOutput(consoleLogSpy)).toEqual({
      query: INSTALL_TEXT,
      context: '',
      citedChunkIds: [],
      totalTokens: 0,
    });
  });

  it('prints the augmented prompt with --prompt', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createContextCommand(() => ctx), ['context', FRUIT_TEXT, '--prompt']);

    expect(logs).toEqual([
      `${FRUIT_TEXT}\n\nAnswer using only the context below. Cite the fragments you rely on as [doc_<id>].\n\n` +
        `Context:\n[doc_2 | fruit.txt]\n${FRUIT_TEXT}`,
    ]);
  });

  it('returns the prompt unchanged when nothing is relevant', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createContextCommand(() => ctx), ['context', 'zzz', '--prompt']);

    expect(logs).toEqual(['zzz']);
  });

  it('rejects a negative budget', async () => {
    const { ctx } = createRecordingContext();

    await expect(
      runCommand(createContextCommand(() => ctx), ['context', 'npm', '--budget', '-1'])
    ).rejects.toThrow('Invalid --budget: -1');
  });
});
