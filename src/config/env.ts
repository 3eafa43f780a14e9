/**
 * Environment Variable Handler
 *
 * Loads provider settings from the environment, with .env support via dotenv.
 * The reranker API key is never logged or included in error messages.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z.object({
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  RERANKER_API_KEY: z.string().optional(),
  /** Overrides rerank.enabled from config.toml */
  DOCRAG_RERANK: BooleanFlagSchema.optional(),
  /** Overrides the ~/.docrag data directory */
  DOCRAG_HOME: z.string().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once; reset with _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError if a variable is set to an invalid value
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  // Empty strings count as unset
  const read = (key: string): string | undefined => {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  };

  const result = EnvSchema.safeParse({
    OLLAMA_HOST: read('OLLAMA_HOST'),
    RERANKER_API_KEY: read('RERANKER_API_KEY'),
    DOCRAG_RERANK: read('DOCRAG_RERANK')?.toLowerCase(),
    DOCRAG_HOME: read('DOCRAG_HOME'),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment variables:\n${issues}`,
      'Fix the values in your shell or .env file'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Whether a reranker API key is configured, without exposing it.
 */
export function hasRerankerApiKey(): boolean {
  return Boolean(getEnv('RERANKER_API_KEY'));
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
