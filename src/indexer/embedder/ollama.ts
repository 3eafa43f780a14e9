/**
 * Ollama Embedding Provider
 *
 * POST {host}/api/embeddings with { model, prompt }. Failures are mapped to
 * EmbeddingProviderError kinds so the CLI can show a targeted hint:
 *
 * - unreachable:       network failure or timeout
 * - model_not_loaded:  Ollama names a missing model, or sends no embedding
 * - input_too_long:    pre-flight estimate exceeds the model context
 * - invalid_response:  any other non-2xx, unparseable body or empty vector
 */

import { z } from 'zod';
import { EmbeddingProviderError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { safeJsonParse } from '../../utils/json.js';
import { estimateTokens, DEFAULT_WORDS_PER_TOKEN } from '../chunker/config.js';
import type { EmbeddingProvider, OllamaEmbeddingOptions } from './types.js';

export const DEFAULT_EMBEDDING_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_INPUT_TOKENS = 8192;

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
  error: z.string().optional(),
});

/** Ollama's wording for a model that hasn't been pulled */
const MISSING_MODEL_PATTERN = /not found|try pulling/i;

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message;
  }
  return String(error);
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly maxInputTokens: number;
  private readonly wordsPerToken: number;

  constructor(
    options: OllamaEmbeddingOptions,
    private readonly logger: Logger = silentLogger
  ) {
    this.endpoint = `${options.host.replace(/\/+$/, '')}/api/embeddings`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
    this.maxInputTokens = options.maxInputTokens ?? DEFAULT_MAX_INPUT_TOKENS;
    this.wordsPerToken = options.wordsPerToken ?? DEFAULT_WORDS_PER_TOKEN;
  }

  async embed(model: string, text: string): Promise<number[]> {
    const estimated = estimateTokens(text, this.wordsPerToken);
    if (estimated > this.maxInputTokens) {
      throw new EmbeddingProviderError(
        'input_too_long',
        `Input is ~${estimated} tokens, model limit is ${this.maxInputTokens}`
      );
    }

    let response: Response;
    let raw: string;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, prompt: text }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      raw = await response.text();
    } catch (error) {
      throw new EmbeddingProviderError(
        'unreachable',
        `Cannot reach Ollama at ${this.endpoint}: ${describe(error)}`
      );
    }

    const parsed = OllamaEmbeddingResponseSchema.safeParse(
      safeJsonParse(raw, (error) => this.logger.debug?.(`Ollama sent non-JSON body: ${error.message}`))
    );
    const providerError = parsed.success ? parsed.data.error : undefined;

    if (providerError && MISSING_MODEL_PATTERN.test(providerError)) {
      throw new EmbeddingProviderError(
        'model_not_loaded',
        `Embedding model '${model}' is not available: ${providerError}`
      );
    }

    if (!response.ok) {
      throw new EmbeddingProviderError(
        'invalid_response',
        `Ollama returned HTTP ${response.status}${providerError ? `: ${providerError}` : ''}`
      );
    }

    if (!parsed.success) {
      throw new EmbeddingProviderError('invalid_response', 'Ollama returned a malformed embedding response');
    }

    const { embedding } = parsed.data;
    if (embedding === undefined) {
      throw new EmbeddingProviderError(
        'model_not_loaded',
        `Ollama returned no embedding for model '${model}'`
      );
    }
    if (embedding.length === 0) {
      throw new EmbeddingProviderError('invalid_response', 'Ollama returned an empty embedding');
    }

    return embedding;
  }
}
