/**
 * Database Row Validation
 *
 * Zod schemas for rows read back from SQLite. A row that does not match means
 * the database and the code disagree (failed migration, manual edits).
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
 * return row ? validateRow(DocumentRowSchema, row, `documents.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const DocumentRowSchema = z.object({
  id: z.number().int(),
  file_name: z.string(),
  file_path: z.string(),
  display_name: z.string().nullable(),
  file_hash: z.string(),
  file_size_bytes: z.number().int().nonnegative(),
  total_chunks: z.number().int().nonnegative(),
  embedding_model: z.string(),
  created_at: z.number().int(),
  updated_at: z.number().int(),
});

export type DocumentRow = z.infer<typeof DocumentRowSchema>;

/**
 * `embedding_blob` comes back from better-sqlite3 as a Buffer.
 */
export const ChunkRowSchema = z.object({
  id: z.number().int(),
  document_id: z.number().int(),
  chunk_index: z.number().int().nonnegative(),
  chunk_text: z.string(),
  embedding_blob: z.instanceof(Buffer),
  token_count: z.number().int().nonnegative(),
  created_at: z.number().int(),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

/** Chunk row joined with its document's name */
export const SourcedChunkRowSchema = ChunkRowSchema.extend({
  document_name: z.string(),
});

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more = formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '';

    super(
      message,
      `Schema validation failed:\n${summary}${more}\n\nThe database may come from a different docrag version.`,
      5
    );
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single row.
 *
 * @param context - Shown in the error, e.g. "documents.id=3"
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
