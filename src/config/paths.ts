/**
 * Centralized Path Definitions
 *
 * ~/.docrag/            (or $DOCRAG_HOME)
 * ├── docrag.db         (SQLite database)
 * └── config.toml       (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the data directory (~/.docrag unless DOCRAG_HOME is set)
 */
export function getDocragDir(): string {
  return getEnv('DOCRAG_HOME') ?? join(homedir(), '.docrag');
}

export function getDbPath(): string {
  return join(getDocragDir(), 'docrag.db');
}

export function getConfigPath(): string {
  return join(getDocragDir(), 'config.toml');
}
