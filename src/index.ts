/**
 * docrag - Library Entry Point
 *
 * The CLI (`docrag`) covers everyday use:
 * ```bash
 * docrag ingest ./docs/setup.md --name "Setup guide"
 * docrag search "install steps"
 * docrag context "How do I deploy?"
 * ```
 *
 * The same pieces are exported here for embedding retrieval in another tool.
 *
 * @example Ingest, then augment a prompt
 * ```typescript
 * import { loadConfig, openStore, createIngestionService, createRagEngine } from 'docrag';
 *
 * const config = loadConfig();
 * const store = openStore();
 *
 * const ingestion = createIngestionService(config, store);
 * const requestId = ingestion.submit('./docs/setup.md');
 * await ingestion.waitFor(requestId);
 *
 * const rag = createRagEngine(config, store);
 * const prompt = await rag.augmentPrompt('How do I install it?');
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './database/index.js';
export * from './indexer/index.js';
export * from './search/index.js';
export * from './agent/index.js';
export * from './utils/index.js';
