/**
 * API Key Validators
 *
 * Validates API key format without exposing key values.
 * Each provider has specific format requirements.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import { getApiKey, API_KEY_ENV_VARS, SETUP_INSTRUCTIONS } from '../config/env.js';
import type { LLMProviderType } from '../config/schema.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a provider's API key.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * Anthropic API key format: sk-ant-api03-...
 * Only the common prefix is checked.
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-ant-'),
    'Invalid Anthropic API key format (should start with "sk-ant-")'
  );

/**
 * OpenAI API key format: sk-..., sk-proj-..., sk-svcacct-...
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-'),
    'Invalid OpenAI API key format (should start with "sk-")'
  );

/**
 * Google AI Studio keys: AIza...
 */
export const GeminiKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('AIza'),
    'Invalid Gemini API key format (should start with "AIza")'
  );

const KEY_SCHEMAS: Record<LLMProviderType, z.ZodType<string>> = {
  openai: OpenAIKeySchema,
  gemini: GeminiKeySchema,
  anthropic: AnthropicKeySchema,
};

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate the API key for a given provider: present, and in the
 * provider's format.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.llm.provider);
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 *   return;
 * }
 * ```
 */
export function validateProviderKey(provider: LLMProviderType): ValidationResult {
  const key = getApiKey(provider);
  if (!key) {
    return {
      valid: false,
      error: `${API_KEY_ENV_VARS[provider]} environment variable is not set`,
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }

  const result = KEY_SCHEMAS[provider].safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }

  return { valid: true };
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get the API key for a provider after validating it.
 *
 * This is the ONLY function that returns the actual key value.
 * Use it only when passing to an API client, never for logging.
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function getProviderKey(provider: LLMProviderType): string {
  const validation = validateProviderKey(provider);
  const key = getApiKey(provider);
  if (!validation.valid || !key) {
    const detail = validation.valid ? undefined : validation.error;
    throw new APIKeyError(provider, API_KEY_ENV_VARS[provider], detail);
  }
  return key;
}
