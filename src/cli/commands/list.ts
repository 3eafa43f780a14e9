/**
 * List Command
 *
 * Displays all ingested documents, newest first:
 *   docrag list          - Show table of documents
 *   docrag ls            - Alias for list
 *   docrag list --json   - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openStore, type Document } from '../../database/index.js';
import { DatabaseError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { formatBytes, formatNumber, formatRelativeTime } from '../../utils/format.js';


export function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List all ingested documents')
    .action(() => {
      const ctx = getContext();

      const store = openStore();
      let documents: Document[];
      try {
        documents = store.getAllDocuments();
      } catch (error) {
        throw new DatabaseError('Failed to query documents from database', error);
      }
      ctx.debug(`Found ${documents.length} document(s)`);

      if (ctx.options.json) {
        const jsonOutput = {
          count: documents.length,
          documents: documents.map((d) => ({
            id: d.id,
            name: d.displayName,
            fileName: d.fileName,
            filePath: d.filePath,
            sizeBytes: d.fileSizeBytes,
            totalChunks: d.totalChunks,
            embeddingModel: d.embeddingModel,
            createdAt: new Date(d.createdAt).toISOString(),
          })),
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      if (documents.length === 0) {
        ctx.log(chalk.yellow('No documents ingested yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('docrag ingest ./docs/guide.md --name "Guide"')}`);
        return;
      }

      const columns: Column[] = [
        { header: 'ID', key: 'id', align: 'right' },
        { header: 'Name', key: 'name', maxWidth: 40 },
        { header: 'Size', key: 'size', align: 'right' },
        { header: 'Chunks', key: 'chunks', align: 'right' },
        { header: 'Model', key: 'model' },
        { header: 'Ingested', key: 'ingested' },
      ];

      const rows = documents.map((d) => ({
        id: String(d.id),
        name: d.displayName,
        size: formatBytes(d.fileSizeBytes),
        chunks: formatNumber(d.totalChunks),
        model: d.embeddingModel,
        ingested: formatRelativeTime(d.createdAt),
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(chalk.dim(`${documents.length} document${documents.length === 1 ? '' : 's'} ingested`));
    });
}
