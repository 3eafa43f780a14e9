/**
 * Environment Variable Handler Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getOllamaHost, hasRerankerApiKey, _clearEnvCache } from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('RERANKER_API_KEY', '');
    vi.stubEnv('DOCRAG_RERANK', '');
    vi.stubEnv('DOCRAG_HOME', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('provides the default Ollama host', () => {
    expect(getOllamaHost()).toBe('http://localhost:11434');
  });

  it('uses a custom OLLAMA_HOST', () => {
    vi.stubEnv('OLLAMA_HOST', 'http://10.0.0.5:11434');

    expect(loadEnv().OLLAMA_HOST).toBe('http://10.0.0.5:11434');
  });

  it('treats empty values as unset', () => {
    const env = loadEnv();

    expect(env.RERANKER_API_KEY).toBeUndefined();
    expect(env.DOCRAG_RERANK).toBeUndefined();
    expect(env.DOCRAG_HOME).toBeUndefined();
    expect(hasRerankerApiKey()).toBe(false);
  });

  it('reports a configured reranker key without exposing it', () => {
    vi.stubEnv('RERANKER_API_KEY', 'test-secret');

    expect(hasRerankerApiKey()).toBe(true);
  });

  it('parses DOCRAG_RERANK flags case-insensitively', () => {
    vi.stubEnv('DOCRAG_RERANK', 'TRUE');
    expect(loadEnv().DOCRAG_RERANK).toBe(true);

    _clearEnvCache();
    vi.stubEnv('DOCRAG_RERANK', '0');
    expect(loadEnv().DOCRAG_RERANK).toBe(false);
  });

  it('throws ConfigError for invalid values', () => {
    vi.stubEnv('DOCRAG_RERANK', 'maybe');
    expect(() => loadEnv()).toThrow(ConfigError);

    _clearEnvCache();
    vi.stubEnv('DOCRAG_RERANK', '');
    vi.stubEnv('OLLAMA_HOST', 'not a url');
    expect(() => loadEnv()).toThrow(/OLLAMA_HOST/);
  });

  it('caches values after the first load', () => {
    vi.stubEnv('OLLAMA_HOST', 'http://first:11434');
    loadEnv();
    vi.stubEnv('OLLAMA_HOST', 'http://second:11434');

    expect(getOllamaHost()).toBe('http://first:11434');
  });
});
