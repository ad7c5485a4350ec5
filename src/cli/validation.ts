/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings; these schemas coerce and bound
 * them before a command touches the config.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

const integerString = (name: string, min: number, max: number) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min && val <= max, {
      message: `${name} must be between ${min} and ${max}`,
    });

export const AskOptionsSchema = z.object({
  topK: integerString('top-k', 1, 50).optional(),
  fusion: z.boolean().optional(),
  hyde: z.boolean().optional(),
  rerank: z.boolean().optional(),
});
export type AskOptions = z.output<typeof AskOptionsSchema>;

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(1000, 'Question too long (max 1000 chars)'),
});

// ============================================================================
// SERVE COMMAND SCHEMA
// ============================================================================

export const ServeOptionsSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty').optional(),
  port: integerString('port', 0, 65535).optional(),
});
export type ServeOptions = z.output<typeof ServeOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Parse input or throw a ValidationError listing every problem.
 * Messages name the flag themselves, so no field path is prepended.
 */
export function parseInput<T extends z.ZodSchema>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => issue.message);
  throw new ValidationError(issues.join('; '), issues);
}
