/**
 * Tests for config command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createConfigCommand } from '../config.js';
import type { TempDir } from '../../../test-utils/fixtures.js';
import { createRecordingContext, jsonOutput, releaseTempHome, runCommand, useTempHome } from './setup.js';

describe('createConfigCommand', () => {
  let home: TempDir;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    home = useTempHome();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    releaseTempHome(home);
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('registers get, set, list, path and reset', () => {
    const cmd = createConfigCommand(() => createRecordingContext().ctx);
    expect(cmd.commands.map((sub) => sub.name())).toEqual(['get', 'set', 'list', 'path', 'reset']);
  });

  it('gets a default value', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createConfigCommand(() => ctx), ['config', 'get', 'retrieval.top_k']);

    expect(logs).toEqual(['5']);
  });

  it('sets a value and reads it back as JSON', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createConfigCommand(() => ctx), ['config', 'set', 'retrieval.top_k', '8']);

    expect(jsonOutput(consoleLogSpy)).toEqual({ success: true, key: 'retrieval.top_k', value: 8 });
    expect(readFileSync(join(home.path, 'config.toml'), 'utf-8')).toContain('top_k = 8');
  });

  it('reports an invalid value without writing it', async () => {
    const { ctx, errors } = createRecordingContext();

    await runCommand(createConfigCommand(() => ctx), ['config', 'set', 'retrieval.top_k', '50']);

    expect(errors[0]).toContain("Invalid value for 'retrieval.top_k'");
    expect(process.exitCode).toBe(1);
  });

  it('reports unknown keys on get', async () => {
    const { ctx, errors } = createRecordingContext();

    await runCommand(createConfigCommand(() => ctx), ['config', 'get', 'retrieval.nope']);

    expect(errors).toEqual(['Unknown config key: retrieval.nope']);
    expect(process.exitCode).toBe(1);
  });

  it('prints the config path inside DOCRAG_HOME', async () => {
    const { ctx, logs } = createRecordingContext();

    await runCommand(createConfigCommand(() => ctx), ['config', 'path']);

    expect(logs).toEqual([join(home.path, 'config.toml')]);
  });

  it('lists flattened keys as JSON', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createConfigCommand(() => ctx), ['config', 'list']);

    expect(jsonOutput(consoleLogSpy)).toMatchObject({
      'embedding.model': 'nomic-embed-text',
      'chunking.words_per_token': 0.75,
      'rerank.enabled': false,
    });
  });

  it('resets to the template with --force', async () => {
    const { ctx, logs } = createRecordingContext();
    await runCommand(createConfigCommand(() => ctx), ['config', 'set', 'retrieval.top_k', '8']);

    await runCommand(createConfigCommand(() => ctx), ['config', 'reset', '--force']);

    const configPath = join(home.path, 'config.toml');
    expect(existsSync(configPath)).toBe(true);
    expect(readFileSync(configPath, 'utf-8')).toContain('# docrag configuration');
    await runCommand(createConfigCommand(() => ctx), ['config', 'get', 'retrieval.top_k']);
    expect(logs.at(-1)).toBe('5');
  });
});
