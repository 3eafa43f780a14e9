/**
 * Remove Command
 *
 * Deletes an ingested document and its chunks:
 *   docrag remove <id>          - Describe what would be deleted (requires --force)
 *   docrag remove <id> --force  - Delete without confirmation
 *
 * Chunks go with their document via ON DELETE CASCADE.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { DocumentIdSchema, parseOption } from '../validation.js';
import { openStore, type Document } from '../../database/index.js';
import { CLIError, DatabaseError } from '../../errors/index.js';
import { formatBytes } from '../../utils/format.js';

interface RemoveOptions {
  force?: boolean;
}

export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<id>', 'Document id (see: docrag list)')
    .description('Remove an ingested document and all its chunks')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((rawId: string, options: RemoveOptions) => {
      const ctx = getContext();
      const id = parseOption(DocumentIdSchema, rawId, 'document id');

      const store = openStore();

      let document: Document | undefined;
      try {
        document = store.getDocument(id);
      } catch (error) {
        throw new DatabaseError(`Failed to look up document ${id}`, error);
      }
      if (!document) {
        throw new CLIError(`Document not found: ${id}`, 'Run: docrag list  to see ingested documents');
      }

      // Confirmation check (unless --force or --json mode)
      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will permanently delete "${document.displayName}" and its chunks.`));
        ctx.log(`  - ${chalk.dim('File:')} ${document.filePath}`);
        ctx.log(`  - ${chalk.dim('Size:')} ${formatBytes(document.fileSizeBytes)}`);
        ctx.log(`  - ${chalk.dim('Chunks:')} ${document.totalChunks.toLocaleString()}`);
        ctx.log('');
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
        process.exitCode = 1;
        return;
      }

      let result: { deleted: boolean; chunksDeleted: number };
      try {
        result = store.deleteDocument(id);
      } catch (error) {
        throw new DatabaseError(`Failed to delete document ${id}`, error);
      }
      ctx.debug(`Deleted ${result.chunksDeleted} chunks`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify({
            success: result.deleted,
            document: { id: document.id, name: document.displayName, filePath: document.filePath },
            deleted: { chunks: result.chunksDeleted },
          })
        );
      } else {
        ctx.log(`${chalk.green('✓')} Removed document ${id} "${chalk.cyan(document.displayName)}"`);
        ctx.log(`  - Deleted ${result.chunksDeleted.toLocaleString()} chunks`);
      }
    });
}
