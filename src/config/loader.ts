/**
 * Configuration Loader
 *
 * 1. Find/create the data directory (~/.docrag)
 * 2. Load config.toml if it exists
 * 3. Validate with the Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides (DOCRAG_RERANK)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getDocragDir, getConfigPath } from './paths.js';
import { getEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

function ensureDocragDir(): void {
  const dir = getDocragDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

type TomlTable = ReturnType<typeof TOML.parse>;

function isTomlTable(value: unknown): value is TomlTable {
  return isPlainObject(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested tables are merged key by key; arrays and scalars are replaced.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Validate user overrides merged onto the defaults.
 */
function mergeWithDefaults(user: Record<string, unknown>, source: string): Config {
  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, user));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      `Fix the values in ${source}`
    );
  }
  return merged.data;
}

function applyEnvOverrides(config: Config): Config {
  const rerank = getEnv('DOCRAG_RERANK');
  if (rerank === undefined) {
    return config;
  }
  return { ...config, rerank: { ...config.rerank, enabled: rerank } };
}

function readConfigFile(configPath: string): TomlTable {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides + env overrides).
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureDocragDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return applyEnvOverrides(mergeWithDefaults({}, configPath));
  }

  const parsed = PartialConfigSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(parsed.error.issues)}`,
      `Fix the values in ${configPath} or delete it to restore defaults`
    );
  }

  return applyEnvOverrides(mergeWithDefaults(parsed.data, configPath));
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('retrieval.top_k') => 5
 */
export function getConfigValue(key: string): unknown {
  return getConfigValueFrom(loadConfig(), key);
}

/**
 * Parse a CLI string into a boolean, number or string
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to config.toml.
 * The full config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (leaf === undefined || parts.length === 0) {
    throw new ConfigError(
      `Invalid config key: '${key}'`,
      'Keys look like section.name, e.g. retrieval.top_k'
    );
  }

  const configPath = getConfigPath();
  ensureDocragDir();
  const config: TomlTable = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let table: TomlTable = config;
  for (const part of parts) {
    const next = table[part];
    if (isTomlTable(next)) {
      table = next;
    } else {
      const created: TomlTable = {};
      table[part] = created;
      table = created;
    }
  }
  table[leaf] = parseValue(value);

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(merged.error.issues)}`,
      'Run: docrag config list  to see current values and types'
    );
  }
  // Unknown keys are stripped by the schema
  if (getConfigValueFrom(merged.data, key) === undefined) {
    throw new ConfigError(`Unknown config key: '${key}'`);
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

function getConfigValueFrom(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 5]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
