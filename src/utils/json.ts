/**
 * JSON Utilities
 *
 * Safe JSON parsing with schema validation and fallback for corrupted data.
 */

import type { ZodType } from 'zod';

/**
 * Parse a JSON string, validate it against a schema, and fall back on error.
 *
 * Use for JSON from external sources (database rows, files, LLM output)
 * where corruption is possible.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param schema - Zod schema the parsed value must satisfy
 * @param fallback - Value to return if parsing or validation fails
 * @param onError - Optional callback for logging parse errors
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, z.record(z.unknown()), {});
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: ZodType<T>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues[0]?.message ?? 'Schema mismatch'), json);
    return fallback;
  }
  return result.data;
}
