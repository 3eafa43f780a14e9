/**
 * Config Module
 *
 * Programmatic config access. CLI users interact via `docrag config`.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  RetrievalConfigSchema,
  RerankConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, getConfigValue, setConfigValue, listConfig } from './loader.js';

export { getDocragDir, getDbPath, getConfigPath } from './paths.js';

export {
  loadEnv,
  getEnv,
  getOllamaHost,
  hasRerankerApiKey,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
