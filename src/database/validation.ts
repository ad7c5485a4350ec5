/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. `as Type` casts are
 * erased at runtime; a schema catches an index written by a different
 * version before it turns into wrong answers.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM chunks WHERE id = ?').get(id);
 * return row ? validateRow(ChunkRowSchema, row, `chunks.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const ChunkRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  metadata: z.string(), // JSON object stored as string
  embedding: z.instanceof(Buffer),
});
export type ChunkRowData = z.infer<typeof ChunkRowSchema>;

export const IndexMetaRowSchema = z.object({
  key: z.enum(['content_hash', 'embedding_model']),
  value: z.string(),
});
export type IndexMetaRowData = z.infer<typeof IndexMetaRowSchema>;

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe index may come from another version. Try: helpdesk index --force`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
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
 * Validate an array of database rows, throwing on the first invalid one.
 *
 * @throws SchemaValidationError naming the row index
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
