/**
 * docrag CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createContextCommand } from './commands/context.js';
import { createIngestCommand } from './commands/ingest.js';
import { createListCommand } from './commands/list.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSearchCommand } from './commands/search.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// Version injected at build time
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('docrag')
  .description('Local document retrieval - ingest text and markdown, search them, build cited context for prompts')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('docrag ingest ./docs/setup.md')}              Ingest a file
  ${chalk.cyan('docrag search "install steps" -k 3')}        Search ingested documents
  ${chalk.cyan('docrag context "How do I deploy?"')}         Build a cited context block
  ${chalk.cyan('docrag list')}                               List ingested documents
  ${chalk.cyan('docrag config set retrieval.top_k 8')}       Change a setting

${chalk.dim('Environment:')}
  OLLAMA_HOST, RERANKER_API_KEY, DOCRAG_RERANK, DOCRAG_HOME
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createContextCommand(getContext));
program.addCommand(createListCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: docrag --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
