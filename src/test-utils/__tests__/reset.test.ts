/**
 * Tests for unified singleton reset utility
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resetAll } from '../reset.js';
import { resetDatabase, closeDb, resetMigrationState } from '../../database/index.js';
import { _clearEnvCache } from '../../config/env.js';

vi.mock('../../database/index.js', () => ({
  resetDatabase: vi.fn(),
  closeDb: vi.fn(),
  resetMigrationState: vi.fn(),
}));

vi.mock('../../config/env.js', () => ({
  _clearEnvCache: vi.fn(),
}));

describe('resetAll', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('resets every singleton once', () => {
    resetAll();

    expect(resetDatabase).toHaveBeenCalledTimes(1);
    expect(closeDb).toHaveBeenCalledTimes(1);
    expect(resetMigrationState).toHaveBeenCalledTimes(1);
    expect(_clearEnvCache).toHaveBeenCalledTimes(1);
  });

  it('drops the store before closing the connection', () => {
    const callOrder: string[] = [];
    vi.mocked(resetDatabase).mockImplementation(() => {
      callOrder.push('store');
    });
    vi.mocked(closeDb).mockImplementation(() => {
      callOrder.push('connection');
    });

    resetAll();

    expect(callOrder).toEqual(['store', 'connection']);
  });
});
