/**
 * Embedding Module
 */

import type { Config } from '../../config/schema.js';
import { getOllamaHost } from '../../config/env.js';
import type { Logger } from '../../utils/logger.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import type { EmbeddingProvider } from './types.js';

export type { EmbeddingProvider, OllamaEmbeddingOptions } from './types.js';
export {
  OllamaEmbeddingProvider,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
  DEFAULT_MAX_INPUT_TOKENS,
} from './ollama.js';

/**
 * Build the configured embedding provider (Ollama, host from OLLAMA_HOST).
 */
export function createEmbeddingProvider(config: Config, logger?: Logger): EmbeddingProvider {
  return new OllamaEmbeddingProvider(
    {
      host: getOllamaHost(),
      timeoutMs: config.embedding.timeout_ms,
      maxInputTokens: config.embedding.max_input_tokens,
      wordsPerToken: config.chunking.words_per_token,
    },
    logger
  );
}
