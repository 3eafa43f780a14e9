/**
 * JSON Utilities
 *
 * Safe JSON parsing for provider responses and debug columns.
 */

/**
 * Parse a JSON string, returning undefined instead of throwing.
 *
 * The result is `unknown`; validate it (zod) before use.
 *
 * @example
 * ```typescript
 * const body = safeJsonParse(await response.text(), (err) => {
 *   logger.warn(`Malformed response: ${err.message}`);
 * });
 * const parsed = ResponseSchema.safeParse(body);
 * ```
 */
export function safeJsonParse(
  json: string | null | undefined,
  onError?: (error: Error, rawValue: string) => void
): unknown {
  if (json === null || json === undefined) {
    return undefined;
  }

  try {
    const value: unknown = JSON.parse(json);
    return value;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return undefined;
  }
}
