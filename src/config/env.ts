/**
 * Environment Variable Handler
 *
 * Loads provider API keys and HELPDESK_* overrides.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even at debug level
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { LLMProviderType } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Everything is optional here: a key is only
 * required for the provider the config actually selects, and that check
 * happens at startup.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  HELPDESK_CONFIG: z.string().optional(),
  HELPDESK_LLM_PROVIDER: z.string().optional(),
  HELPDESK_LLM_MODEL: z.string().optional(),
  HELPDESK_EMBEDDING_PROVIDER: z.string().optional(),
  HELPDESK_EMBEDDING_MODEL: z.string().optional(),
  HELPDESK_VECTOR_STORE: z.string().optional(),
  HELPDESK_PERSIST_DIR: z.string().optional(),
  HELPDESK_KNOWLEDGE_BASE: z.string().optional(),
  HELPDESK_RERANK: z.string().optional(),
  HELPDESK_HYDE: z.string().optional(),
  HELPDESK_RAG_FUSION: z.string().optional(),
  HELPDESK_K_QUERIES: z.string().optional(),
  HELPDESK_RRF_K: z.string().optional(),
  HELPDESK_TOP_K: z.string().optional(),
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Provider → environment variable holding its key */
export const API_KEY_ENV_VARS = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
} as const satisfies Record<LLMProviderType, keyof EnvVars>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment (loaded once at first access).
 * Reset with _clearEnvCache() in tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Empty strings are treated as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw: Record<string, string | undefined> = {};
  for (const key of EnvSchema.keyof().options) {
    const value = process.env[key]?.trim();
    raw[key] = value ? value : undefined;
  }

  const result = EnvSchema.safeParse(raw);
  // The schema only holds optional strings, so parsing can't fail on real env input
  _envCache = result.success ? result.data : {};

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Get the API key for a provider, or undefined when it isn't set.
 */
export function getApiKey(provider: LLMProviderType): string | undefined {
  return getEnv(API_KEY_ENV_VARS[provider]);
}

/**
 * Check if an API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(provider: LLMProviderType): boolean {
  return Boolean(getApiKey(provider));
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions, shown when a required key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<LLMProviderType, string> = {
  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="sk-..."

3. Restart the service
`.trim(),

  gemini: `
To use Google Gemini models:

1. Get your API key from https://aistudio.google.com/apikey
2. Set the environment variable (or add it to .env):

   export GEMINI_API_KEY="..."

3. Restart the service
`.trim(),

  anthropic: `
To use Anthropic models:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable (or add it to .env):

   export ANTHROPIC_API_KEY="sk-ant-..."

3. Restart the service

Note: Anthropic has no embedding API; keep embedding.provider on openai or gemini.
`.trim(),
};
