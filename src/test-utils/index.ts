/**
 * Test Utilities Module
 *
 * @example
 * ```typescript
 * import { resetAll, createTestStore } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

export { resetAll } from './reset.js';
export {
  createTestStore,
  createTempDir,
  fakeEmbedding,
  FakeEmbeddingProvider,
  FAKE_DIMENSIONS,
  type TestStore,
  type TempDir,
} from './fixtures.js';
