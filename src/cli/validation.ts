/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js hands every option over as a string; these schemas coerce
 * and bound them before they reach library code.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

export const QueryArgSchema = z
  .string()
  .trim()
  .min(1, 'Query cannot be empty')
  .max(1000, 'Query too long (max 1000 chars)');

/**
 * Positive integer no larger than `max` (the configured retrieval.max_top_k).
 */
export function topKSchema(max: number) {
  return z.coerce
    .number()
    .int('must be an integer')
    .min(1, 'must be at least 1')
    .max(max, `must be at most ${max}`);
}

export const ContentClassSchema = z.enum(['code', 'text'], {
  errorMap: () => ({ message: "must be 'code' or 'text'" }),
});

export const TokenBudgetOptionSchema = z.coerce
  .number()
  .int('must be an integer')
  .nonnegative('cannot be negative');

export const DocumentIdSchema = z.coerce
  .number()
  .int('must be an integer')
  .positive('must be a positive document id');

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(DocumentIdSchema, '12');
 * if (!result.success) {
 *   ctx.error(result.error);
 * }
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}

/**
 * Parse a single CLI value, throwing a ValidationError that names the flag.
 *
 * @example
 * ```typescript
 * parseOption(topKSchema(10), '3', '--top-k')  // 3
 * parseOption(topKSchema(10), '0', '--top-k')  // throws "Invalid --top-k: 0"
 * ```
 */
export function parseOption<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw new ValidationError(
    `Invalid ${label}: ${String(value)}`,
    result.error.issues.map((issue) => issue.message)
  );
}
