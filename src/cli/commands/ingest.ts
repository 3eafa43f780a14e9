/**
 * Ingest Command
 *
 * Chunks, embeds and stores text or markdown files:
 *   docrag ingest <file...>                 Ingest one or more files
 *   docrag ingest guide.md --name "Guide"   Set the display name
 *   docrag ingest notes.txt --json          Print results as JSON
 *
 * Re-ingesting a file with identical content replaces the earlier document.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { openStore } from '../../database/index.js';
import { createIngestionService, type IngestResult, type ProgressSnapshot } from '../../indexer/index.js';
import { CLIError } from '../../errors/index.js';

interface IngestCommandOptions {
  name?: string;
}

interface FileOutcome {
  file: string;
  result: IngestResult;
}

function progressText(file: string, snapshot: ProgressSnapshot): string {
  if (snapshot.total === 0) {
    return `${file}: preparing...`;
  }
  return `${file}: ${snapshot.current}/${snapshot.total} chunks (${snapshot.percentage}%)`;
}

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<files...>', 'Text (.txt) or markdown (.md) files to ingest')
    .description('Ingest files into the document store')
    .option('-n, --name <name>', 'Display name (only with a single file)')
    .action(async (files: string[], cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();

      if (cmdOptions.name !== undefined && files.length > 1) {
        throw new CLIError(
          '--name can only be used when ingesting a single file',
          'Ingest the files one at a time to give each a name'
        );
      }

      const store = openStore();
      const config = loadConfig();
      ctx.debug(`Embedding model: ${config.embedding.model}`);

      const service = createIngestionService(config, store, ctx);

      const interactive = !ctx.options.json && process.stdout.isTTY === true;

      const outcomes: FileOutcome[] = [];
      for (const file of files) {
        const spinner: Ora | null = interactive ? ora(`${file}: reading...`).start() : null;
        const requestId = service.submit(file, { displayName: cmdOptions.name });
        const onProgress = (id: string, snapshot: ProgressSnapshot) => {
          if (id !== requestId) return;
          if (spinner) {
            spinner.text = progressText(file, snapshot);
          } else {
            ctx.debug(progressText(file, snapshot));
          }
        };
        service.on('progress', onProgress);

        const result = await service.waitFor(requestId);
        service.off('progress', onProgress);
        if (!result) {
          throw new CLIError(`Lost track of ingestion for ${file}`);
        }
        outcomes.push({ file, result });

        if (result.success) {
          spinner?.succeed(`${file}: ${result.totalChunks} chunk${result.totalChunks === 1 ? '' : 's'}`);
        } else {
          spinner?.fail(`${file}: ${result.error.message}`);
        }
      }

      const failures = outcomes.filter((o) => !o.result.success);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              ingested: outcomes.length - failures.length,
              failed: failures.length,
              results: outcomes.map(({ file, result }) =>
                result.success
                  ? { file, success: true, documentId: result.documentId, totalChunks: result.totalChunks }
                  : { file, success: false, error: result.error.message, code: result.error.code }
              ),
            },
            null,
            2
          )
        );
      } else {
        for (const { file, result } of outcomes) {
          if (result.success) {
            ctx.log(
              `${chalk.green('✓')} ${file} ${chalk.dim('→')} document ${chalk.cyan(String(result.documentId))} ` +
                chalk.dim(`(${result.totalChunks} chunk${result.totalChunks === 1 ? '' : 's'})`)
            );
          } else {
            ctx.log(`${chalk.red('✗')} ${file}: ${result.error.message}`);
            if (result.error.hint) {
              ctx.log(chalk.dim(`  Hint: ${result.error.hint}`));
            }
          }
        }
      }

      if (failures.length > 0) {
        const first = failures[0]?.result;
        process.exitCode = first && !first.success ? first.error.code : 1;
      }
    });
}
