/**
 * Search Command
 *
 * Dense search over every ingested chunk, with an optional keyword boost
 * and cross-encoder reranking:
 *
 *   docrag search "install steps"
 *   docrag search "parse config" --class code -k 3
 *   docrag search "deployment" --rerank --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { ContentClassSchema, QueryArgSchema, parseOption, topKSchema } from '../validation.js';
import { loadConfig } from '../../config/index.js';
import { openStore } from '../../database/index.js';
import { createEmbeddingProvider } from '../../indexer/embedder/index.js';
import { createRetrievalEngine, formatResults, formatResultsJSON } from '../../search/index.js';

interface SearchCommandOptions {
  topK?: string;
  class?: string;
  /** --rerank / --no-rerank; undefined defers to config */
  rerank?: boolean;
}

function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Pass --class code for code-like queries (lower threshold)'));
  ctx.log(chalk.dim('  - Run: docrag list  to check what is ingested'));
}

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search ingested documents')
    .option('-k, --top-k <number>', 'Number of results to return (default: retrieval.top_k)')
    .option('-c, --class <class>', "Query class: 'code' or 'text' (sets the similarity threshold)")
    .option('-r, --rerank', 'Rerank candidates with the cross-encoder')
    .option('--no-rerank', 'Disable reranking even if enabled in config')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const trimmedQuery = parseOption(QueryArgSchema, query, 'query');

      const store = openStore();
      const config = loadConfig();

      const topK =
        cmdOptions.topK === undefined
          ? undefined
          : parseOption(topKSchema(config.retrieval.max_top_k), cmdOptions.topK, '--top-k');
      const contentClass =
        cmdOptions.class === undefined ? undefined : parseOption(ContentClassSchema, cmdOptions.class, '--class');

      ctx.debug(`Embedding query with ${config.embedding.model}`);
      const embedder = createEmbeddingProvider(config, ctx);
      const queryEmbedding = await embedder.embed(config.embedding.model, trimmedQuery);

      const engine = createRetrievalEngine(config, store, ctx);
      const results = await engine.search({
        queryEmbedding,
        queryText: trimmedQuery,
        contentClass,
        topK,
        rerank: cmdOptions.rerank,
      });
      ctx.debug(`Found ${results.length} result(s)`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              query: trimmedQuery,
              count: results.length,
              results: formatResultsJSON(results),
            },
            null,
            2
          )
        );
      } else if (results.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
      } else {
        ctx.log(
          chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) +
            chalk.dim(` for "${trimmedQuery}"`)
        );
        ctx.log('');
        ctx.log(formatResults(results, { snippetLength: 200 }));
      }
    });
}
