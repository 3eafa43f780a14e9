/**
 * Configuration Schema
 *
 * Defines the shape of ~/.docrag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding provider configuration (Ollama)
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model name, stored with every document'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Request timeout for one embedding call (1000-600000)'),
  max_input_tokens: z
    .number()
    .int()
    .positive()
    .describe('Model context size; longer inputs fail before the request is sent'),
});

/**
 * Chunking configuration
 */
export const ChunkingConfigSchema = z.object({
  max_tokens_per_chunk: z.number().int().min(16).max(8192),
  overlap_tokens: z.number().int().min(0),
  words_per_token: z
    .number()
    .positive()
    .max(4)
    .describe('Word-count heuristic: tokens = floor(words / words_per_token)'),
});

/**
 * Ingestion limits
 */
export const IngestionConfigSchema = z.object({
  max_file_size_bytes: z.number().int().positive(),
  progress_retention_ms: z
    .number()
    .int()
    .min(0)
    .describe('How long a finished ingestion stays visible to progress polling'),
});

/**
 * Retrieval / ranking configuration
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).describe('Results returned when the caller does not ask'),
  max_top_k: z.number().int().min(1).max(100).describe('Hard ceiling on results per search'),
  code_threshold: z.number().min(-1).max(1),
  text_threshold: z.number().min(-1).max(1),
  lexical_boost: z.boolean().describe('Boost scores by query keyword overlap'),
  rerank_candidates: z.number().int().min(1).max(100),
});

/**
 * Cross-encoder reranking configuration
 */
export const RerankConfigSchema = z.object({
  enabled: z.boolean(),
  model: z.string().min(1),
  base_url: z.string().url(),
  threshold: z.number(),
  timeout_ms: z.number().int().min(1000).max(600000),
});

export const ContextConfigSchema = z.object({
  max_tokens: z.number().int().positive().describe('Token budget of an assembled context'),
});

export const StorageConfigSchema = z.object({
  keep_embedding_json: z
    .boolean()
    .describe('Also store a JSON copy of each embedding for debugging'),
});

const BaseConfigSchema = z.object({
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  ingestion: IngestionConfigSchema,
  retrieval: RetrievalConfigSchema,
  rerank: RerankConfigSchema,
  context: ContextConfigSchema,
  storage: StorageConfigSchema,
});

/**
 * Root configuration schema - the complete shape of config.toml
 */
export const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (config.chunking.overlap_tokens >= config.chunking.max_tokens_per_chunk) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'overlap_tokens'],
      message: 'must be smaller than chunking.max_tokens_per_chunk',
    });
  }
  if (config.retrieval.top_k > config.retrieval.max_top_k) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['retrieval', 'top_k'],
      message: 'must not exceed retrieval.max_top_k',
    });
  }
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults.
 * Every field becomes optional, allowing sparse config files.
 */
export const PartialConfigSchema = BaseConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
