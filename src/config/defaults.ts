/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and as the base that a sparse
 * config.toml is merged onto.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  embedding: {
    model: 'nomic-embed-text',
    timeout_ms: 60000,
    max_input_tokens: 8192,
  },

  chunking: {
    max_tokens_per_chunk: 500,
    overlap_tokens: 100,
    words_per_token: 0.75,
  },

  ingestion: {
    max_file_size_bytes: 10 * 1024 * 1024,
    progress_retention_ms: 60000,
  },

  retrieval: {
    top_k: 5,
    max_top_k: 10,
    // Code embeddings cluster less tightly than prose
    code_threshold: 0.5,
    text_threshold: 0.65,
    lexical_boost: true,
    rerank_candidates: 20,
  },

  rerank: {
    enabled: false,
    model: 'BAAI/bge-reranker-v2-m3',
    base_url: 'https://router.huggingface.co/models',
    threshold: 0.5,
    timeout_ms: 30000,
  },

  context: {
    max_tokens: 2000,
  },

  storage: {
    keep_embedding_json: false,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.docrag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# docrag configuration
# Location: ~/.docrag/config.toml (override the directory with DOCRAG_HOME)

[embedding]
# Ollama model used for documents and queries (host: OLLAMA_HOST)
model = "${DEFAULT_CONFIG.embedding.model}"
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
max_input_tokens = ${DEFAULT_CONFIG.embedding.max_input_tokens}

[chunking]
max_tokens_per_chunk = ${DEFAULT_CONFIG.chunking.max_tokens_per_chunk}
overlap_tokens = ${DEFAULT_CONFIG.chunking.overlap_tokens}
# tokens = floor(words / words_per_token)
words_per_token = ${DEFAULT_CONFIG.chunking.words_per_token}

[ingestion]
max_file_size_bytes = ${DEFAULT_CONFIG.ingestion.max_file_size_bytes}
progress_retention_ms = ${DEFAULT_CONFIG.ingestion.progress_retention_ms}

[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
max_top_k = ${DEFAULT_CONFIG.retrieval.max_top_k}
code_threshold = ${DEFAULT_CONFIG.retrieval.code_threshold}
text_threshold = ${DEFAULT_CONFIG.retrieval.text_threshold}
lexical_boost = ${DEFAULT_CONFIG.retrieval.lexical_boost}
rerank_candidates = ${DEFAULT_CONFIG.retrieval.rerank_candidates}

[rerank]
# Cross-encoder reranking (API key: RERANKER_API_KEY, toggle: DOCRAG_RERANK)
enabled = ${DEFAULT_CONFIG.rerank.enabled}
model = "${DEFAULT_CONFIG.rerank.model}"
base_url = "${DEFAULT_CONFIG.rerank.base_url}"
threshold = ${DEFAULT_CONFIG.rerank.threshold}
timeout_ms = ${DEFAULT_CONFIG.rerank.timeout_ms}

[context]
max_tokens = ${DEFAULT_CONFIG.context.max_tokens}

[storage]
keep_embedding_json = ${DEFAULT_CONFIG.storage.keep_embedding_json}
`;
