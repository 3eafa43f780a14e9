/**
 * Context Command
 *
 * Builds the token-bounded context block a prompt would be augmented with:
 *
 *   docrag context "How do I deploy?"
 *   docrag context "retry policy" --budget 500 --class text
 *   docrag context "How do I deploy?" --prompt     Print the full augmented prompt
 *
 * Each fragment is tagged [doc_<id> | <name>], so answers can cite it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import {
  ContentClassSchema,
  QueryArgSchema,
  TokenBudgetOptionSchema,
  parseOption,
  topKSchema,
} from '../validation.js';
import { loadConfig } from '../../config/index.js';
import { openStore } from '../../database/index.js';
import { createRagEngine, formatCitations } from '../../agent/index.js';
import type { RetrieveOptions } from '../../agent/index.js';

interface ContextCommandOptions {
  budget?: string;
  topK?: string;
  class?: string;
  rerank?: boolean;
  prompt?: boolean;
}

export function createContextCommand(getContext: () => CommandContext): Command {
  return new Command('context')
    .argument('<query>', 'Question or prompt to gather context for')
    .description('Assemble cited context for a prompt')
    .option('-b, --budget <tokens>', 'Token budget (default: context.max_tokens)')
    .option('-k, --top-k <number>', 'Chunks to retrieve before packing')
    .option('-c, --class <class>', "Query class: 'code' or 'text'")
    .option('-r, --rerank', 'Rerank candidates with the cross-encoder')
    .option('--no-rerank', 'Disable reranking even if enabled in config')
    .option('-p, --prompt', 'Print the augmented prompt instead of the bare context')
    .action(async (query: string, cmdOptions: ContextCommandOptions) => {
      const ctx = getContext();
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const trimmedQuery = parseOption(QueryArgSchema, query, 'query');

      const store = openStore();
      const config = loadConfig();

      const retrieveOptions: RetrieveOptions = {
        rerank: cmdOptions.rerank,
        tokenBudget:
          cmdOptions.budget === undefined
            ? undefined
            : parseOption(TokenBudgetOptionSchema, cmdOptions.budget, '--budget'),
        topK:
          cmdOptions.topK === undefined
            ? undefined
            : parseOption(topKSchema(config.retrieval.max_top_k), cmdOptions.topK, '--top-k'),
        contentClass:
          cmdOptions.class === undefined ? undefined : parseOption(ContentClassSchema, cmdOptions.class, '--class'),
      };

      const rag = createRagEngine(config, store, ctx);

      if (cmdOptions.prompt) {
        const augmented = await rag.augmentPrompt(trimmedQuery, retrieveOptions);
        if (ctx.options.json) {
          console.log(JSON.stringify({ prompt: augmented }, null, 2));
        } else {
          ctx.log(augmented);
        }
        return;
      }

      const { context, citedChunkIds, totalTokens, results } = await rag.retrieve(trimmedQuery, retrieveOptions);

      if (ctx.options.json) {
        console.log(JSON.stringify({ query: trimmedQuery, context, citedChunkIds, totalTokens }, null, 2));
        return;
      }

      if (!context) {
        ctx.log(chalk.yellow(`No relevant context found for "${trimmedQuery}"`));
        return;
      }

      ctx.log(context);
      ctx.log('');
      ctx.log(chalk.bold('Sources:'));
      ctx.log(formatCitations(results, citedChunkIds, { showScores: ctx.options.verbose }));
      ctx.log('');
      ctx.log(chalk.dim(`${citedChunkIds.length} fragment${citedChunkIds.length === 1 ? '' : 's'}, ~${totalTokens} tokens`));
    });
}
