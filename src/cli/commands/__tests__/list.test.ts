/**
 * Tests for list command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { createListCommand } from '../list.js';
import { SQLiteVectorStore, openDatabase } from '../../../database/index.js';
import { DatabaseError } from '../../../errors/index.js';
import type { TempDir } from '../../../test-utils/fixtures.js';
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

describe('createListCommand', () => {
  let home: TempDir;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    home = useTempHome();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    releaseTempHome(home);
    vi.restoreAllMocks();
  });

  it('has ls alias', () => {
    const cmd = createListCommand(() => createRecordingContext().ctx);
    expect(cmd.aliases()).toContain('ls');
  });

  it('shows a getting-started hint when empty', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createListCommand(() => ctx), ['list']);

    expect(logs[0]).toContain('No documents ingested yet.');
  });

  it('lists documents newest first as JSON', async () => {
    seedDocuments([
      ['install.txt', INSTALL_TEXT],
      ['fruit.txt', FRUIT_TEXT],
    ]);
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createListCommand(() => ctx), ['list']);

    expect(jsonOutput(consoleLogSpy)).toMatchObject({
      count: 2,
      documents: [
        { id: 2, name: 'fruit.txt', filePath: '/docs/fruit.txt', totalChunks: 1, sizeBytes: FRUIT_TEXT.length },
        { id: 1, name: 'install.txt', filePath: '/docs/install.txt', totalChunks: 1 },
      ],
    });
  });

  it('renders a table with a count footer', async () => {
    seedDocuments([['install.txt', INSTALL_TEXT]]);
    const { ctx, logs } = createRecordingContext();

    await runCommand(createListCommand(() => ctx), ['list']);

    expect(logs[0]).toContain('install.txt');
    expect(logs[0]).toContain('nomic-embed-text');
    expect(logs[2]).toContain('1 document ingested');
  });

  it('fails with a database error when a migration cannot be applied', async () => {
    // A column the second migration would add already exists
    const db = openDatabase(join(home.path, 'docrag.db'));
    db.exec('CREATE TABLE documents (id INTEGER PRIMARY KEY, display_name TEXT)');
    db.close();
    const { ctx } = createRecordingContext();

    const run = runCommand(createListCommand(() => ctx), ['list']);

    await expect(run).rejects.toBeInstanceOf(DatabaseError);
    await expect(run).rejects.toMatchObject({
      code: 5,
      message: expect.stringMatching(/^Database migration 002-add-display-name\.sql failed: /),
    });
  });

  it('wraps store failures in a database error', async () => {
    vi.spyOn(SQLiteVectorStore.prototype, 'getAllDocuments').mockImplementation(() => {
      throw new Error('disk I/O error');
    });
    const { ctx } = createRecordingContext();

    const run = runCommand(createListCommand(() => ctx), ['list']);

    await expect(run).rejects.toMatchObject({ message: 'Failed to query documents from database', code: 5 });
    await expect(run).rejects.toHaveProperty('cause.message', 'disk I/O error');
  });
});
