/**
 * Tests for ingest command
 *
 * Runs against a real SQLite database in a temp DOCRAG_HOME; only the
 * embedding provider and the spinner are replaced.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return { ...actual, createEmbeddingProvider: vi.fn() };
});

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  })),
}));

import { createIngestCommand } from '../ingest.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/index.js';
import { getDatabase } from '../../../database/index.js';
import { FakeEmbeddingProvider, type TempDir } from '../../../test-utils/fixtures.js';
import { INSTALL_TEXT, createRecordingContext, jsonOutput, releaseTempHome, runCommand, useTempHome } from './setup.js';

describe('createIngestCommand', () => {
  let home: TempDir;
  let embedder: FakeEmbeddingProvider;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    home = useTempHome();
    embedder = new FakeEmbeddingProvider();
    vi.mocked(createEmbeddingProvider).mockReturnValue(embedder);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    releaseTempHome(home);
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('command structure', () => {
    it('takes one or more files', () => {
      const cmd = createIngestCommand(() => createRecordingContext().ctx);
      expect(cmd.name()).toBe('ingest');
      expect(cmd.registeredArguments[0]?.variadic).toBe(true);
    });

    it('has --name option', () => {
      const cmd = createIngestCommand(() => createRecordingContext().ctx);
      expect(cmd.options.find((opt) => opt.long === '--name')?.short).toBe('-n');
    });
  });

  it('stores the document and reports its id', async () => {
    const file = home.write('install.txt', INSTALL_TEXT);
    const { ctx, logs } = createRecordingContext();

    await runCommand(createIngestCommand(() => ctx), ['ingest', file, '--name', 'Install notes']);

    const [document] = getDatabase().getAllDocuments();
    expect(document?.displayName).toBe('Install notes');
    expect(document?.totalChunks).toBe(1);
    expect(embedder.calls).toEqual([INSTALL_TEXT]);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toContain(file);
    expect(process.exitCode).toBeUndefined();
  });

  it('prints per-file results as JSON', async () => {
    const first = home.write('a.txt', INSTALL_TEXT);
    const second = home.write('b.md', '# Notes\n\nBananas ripen faster beside apples');
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createIngestCommand(() => ctx), ['ingest', first, second]);

    expect(jsonOutput(consoleLogSpy)).toEqual({
      ingested: 2,
      failed: 0,
      results: [
        { file: first, success: true, documentId: 1, totalChunks: 1 },
        { file: second, success: true, documentId: 2, totalChunks: 1 },
      ],
    });
  });

  it('keeps going after a failed file and exits with its code', async () => {
    const missing = `${home.path}/missing.txt`;
    const good = home.write('good.txt', INSTALL_TEXT);
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createIngestCommand(() => ctx), ['ingest', missing, good]);

    expect(jsonOutput(consoleLogSpy)).toMatchObject({
      ingested: 1,
      failed: 1,
      results: [
        { file: missing, success: false, code: 3 },
        { file: good, success: true, documentId: 1 },
      ],
    });
    expect(process.exitCode).toBe(3);
  });

  it('shows the hint for unsupported files', async () => {
    const file = home.write('data.csv', 'a,b,c');
    const { ctx, logs } = createRecordingContext();

    await runCommand(createIngestCommand(() => ctx), ['ingest', file]);

    expect(logs[0]).toContain('data.csv');
    expect(logs[1]).toContain('Hint:');
    expect(process.exitCode).toBe(6);
    expect(getDatabase().getAllDocuments()).toEqual([]);
  });

  it('rejects --name with several files', async () => {
    const { ctx } = createRecordingContext();

    await expect(
      runCommand(createIngestCommand(() => ctx), ['ingest', 'a.txt', 'b.txt', '--name', 'Both'])
    ).rejects.toThrow('--name can only be used when ingesting a single file');
  });
});
