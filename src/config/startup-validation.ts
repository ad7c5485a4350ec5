/**
 * Startup Configuration Validation
 *
 * Checks the API keys the selected providers need before anything is built.
 * A missing or malformed key for a provider the config selects is fatal:
 * the service would only fail later, on the first question.
 */

import chalk from 'chalk';
import { validateProviderKey } from '../providers/validation.js';
import { API_KEY_ENV_VARS } from './env.js';
import type { Config, LLMProviderType } from './schema.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupProblem {
  provider: LLMProviderType;
  /** What the provider is needed for */
  role: 'llm' | 'embedding';
  message: string;
  hint: string;
}

export interface StartupValidationResult {
  valid: boolean;
  problems: StartupProblem[];
}

export interface StartupValidationOptions {
  /** Skip LLM provider validation (for commands that don't call the LLM) */
  skipLLM?: boolean;
  /** Skip embedding provider validation */
  skipEmbedding?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate the keys for the configured providers.
 * A provider used for both roles is reported once.
 */
export function validateStartupConfig(
  config: Config,
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipLLM = false, skipEmbedding = false } = options;
  const needed: Array<{ provider: LLMProviderType; role: StartupProblem['role'] }> = [];

  if (!skipLLM) {
    needed.push({ provider: config.llm.provider, role: 'llm' });
  }
  if (!skipEmbedding && !needed.some((n) => n.provider === config.embedding.provider)) {
    needed.push({ provider: config.embedding.provider, role: 'embedding' });
  }

  const problems: StartupProblem[] = [];
  for (const { provider, role } of needed) {
    const validation = validateProviderKey(provider);
    if (!validation.valid) {
      problems.push({
        provider,
        role,
        message: validation.error,
        hint: validation.setupInstructions,
      });
    }
  }

  return { valid: problems.length === 0, problems };
}

/**
 * Throw for the first startup problem.
 *
 * @throws APIKeyError naming the provider and its environment variable
 */
export function assertStartupConfig(config: Config, options: StartupValidationOptions = {}): void {
  const [first] = validateStartupConfig(config, options).problems;
  if (first) {
    throw new APIKeyError(first.provider, API_KEY_ENV_VARS[first.provider], first.message);
  }
}

/**
 * Print startup problems to stderr.
 */
export function printStartupValidation(result: StartupValidationResult): void {
  for (const problem of result.problems) {
    console.error(chalk.red(`✗ ${problem.role === 'llm' ? 'LLM' : 'Embedding'}: ${problem.message}`));
    console.error(chalk.dim(problem.hint.replace(/^/gm, '  ')));
  }
}

// `serve` is absent on purpose: it starts degraded and reports problems via /health
/** Commands that call the completion model */
export const COMMANDS_REQUIRING_LLM = ['ask', 'chat'];

/** Commands that embed text */
export const COMMANDS_REQUIRING_EMBEDDING = ['ask', 'chat', 'index'];

export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipLLM: !COMMANDS_REQUIRING_LLM.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
  };
}
