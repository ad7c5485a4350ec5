/**
 * Provider Factories
 *
 * Central entry point for creating the completion and embedding services
 * from configuration. The provider is chosen once here; nothing downstream
 * switches on it again.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const llm = createCompletionService(config);
 * const answer = await llm.complete('How do I reset my PIN?');
 * ```
 */

import type { Config } from '../config/schema.js';
import { getProviderKey } from './validation.js';
import { OpenAICompletionService, OpenAIEmbeddingService } from './openai.js';
import { AnthropicCompletionService } from './anthropic.js';
import type { CompletionService, EmbeddingService } from './types.js';

export interface CompletionFactoryOptions {
  /** Override llm.model from config */
  model?: string;
}

/**
 * Create the completion service for config.llm.provider.
 *
 * @throws APIKeyError if the provider's key is missing or malformed
 */
export function createCompletionService(
  config: Config,
  options: CompletionFactoryOptions = {}
): CompletionService {
  const { llm } = config;
  const model = options.model ?? llm.model;
  const provider = llm.provider;

  switch (provider) {
    case 'openai':
    case 'gemini':
      return new OpenAICompletionService({
        provider,
        apiKey: getProviderKey(provider),
        model,
        temperature: llm.temperature,
        maxTokens: llm.max_tokens,
        timeoutMs: llm.timeout_ms,
      });

    case 'anthropic':
      return new AnthropicCompletionService({
        apiKey: getProviderKey(provider),
        model,
        temperature: llm.temperature,
        maxTokens: llm.max_tokens,
        timeoutMs: llm.timeout_ms,
      });

    default: {
      // TypeScript exhaustiveness check
      const _exhaustiveCheck: never = provider;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}

/**
 * Create the embedding service for config.embedding.provider.
 *
 * @throws APIKeyError if the provider's key is missing or malformed
 */
export function createEmbeddingService(config: Config): EmbeddingService {
  const { embedding } = config;
  const provider = embedding.provider;

  switch (provider) {
    case 'openai':
    case 'gemini':
      return new OpenAIEmbeddingService({
        provider,
        apiKey: getProviderKey(provider),
        model: embedding.model,
        batchSize: embedding.batch_size,
        timeoutMs: embedding.timeout_ms,
      });

    default: {
      const _exhaustiveCheck: never = provider;
      throw new Error(`Unknown embedding provider: ${String(_exhaustiveCheck)}`);
    }
  }
}
