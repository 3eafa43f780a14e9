/**
 * Test Utilities - Unified Reset
 *
 * Resets every module-level singleton for test isolation.
 *
 * ORDER MATTERS: the store singleton holds the connection, so it is
 * dropped before the connection is closed.
 */

import { resetDatabase, closeDb, resetMigrationState } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  resetDatabase();
  closeDb();
  resetMigrationState();
  _clearEnvCache();
}
