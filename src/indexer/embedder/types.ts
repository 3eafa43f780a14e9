/**
 * Embedding Types
 *
 * The engine reaches its embedding model through this one contract, so the
 * Ollama client can be swapped for any other backend (or a test fake).
 */

/**
 * Text in, fixed-dimension vector out.
 *
 * Implementations reject with an EmbeddingProviderError; they never resolve
 * to an empty vector.
 */
export interface EmbeddingProvider {
  embed(model: string, text: string): Promise<number[]>;
}

export interface OllamaEmbeddingOptions {
  /** Server URL, e.g. http://localhost:11434 (no trailing path) */
  host: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Estimated tokens above which a request is refused before it is sent */
  maxInputTokens?: number;
  /** Words-per-token constant used for the pre-flight estimate */
  wordsPerToken?: number;
}
