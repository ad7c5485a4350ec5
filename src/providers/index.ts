/**
 * Providers Module
 *
 * Completion and embedding services behind small interfaces, plus API key
 * validation.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createCompletionService, createEmbeddingService } from './providers';
 * const llm = createCompletionService(config);
 * const embedder = createEmbeddingService(config);
 * ```
 */

export type {
  CompletionService,
  CompletionOptions,
  EmbeddingService,
  EmbedOptions,
} from './types.js';

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export {
  validateProviderKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  GeminiKeySchema,
  type ValidationResult,
} from './validation.js';

// ============================================================================
// FACTORIES AND IMPLEMENTATIONS
// ============================================================================

export {
  createCompletionService,
  createEmbeddingService,
  type CompletionFactoryOptions,
} from './llm.js';

export {
  OpenAICompletionService,
  OpenAIEmbeddingService,
  GEMINI_BASE_URL,
  type OpenAICompatibleProvider,
} from './openai.js';

export { AnthropicCompletionService } from './anthropic.js';

export { toUpstreamError, isCancellation, type SdkErrorClasses } from './errors.js';
