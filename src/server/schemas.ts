/**
 * Request Schemas
 *
 * Zod schemas for the JSON bodies the API accepts.
 */

import { z } from 'zod';

export const QueryRequestSchema = z.object({
  query: z.string().min(1).max(1000),
  session_id: z.string().min(1).optional(),
  user_id: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
});
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const SessionRequestSchema = z
  .object({
    user_id: z.string().min(1).optional(),
  })
  .optional();

export const SessionQuerySchema = z.object({
  user_id: z.string().min(1).optional(),
});

/**
 * Voice-agent webhook event. Providers name the event field `status` or
 * `type`; other fields are ignored.
 */
export const VoiceWebhookSchema = z
  .object({
    status: z.string().optional(),
    type: z.string().optional(),
    transcript: z.string().optional(),
    call_id: z.string().optional(),
  })
  .passthrough();
export type VoiceWebhookEvent = z.infer<typeof VoiceWebhookSchema>;

/**
 * One line per issue: `query: String must contain at most 1000 character(s)`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
