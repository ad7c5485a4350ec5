/**
 * Provider Interfaces
 *
 * The retrieval pipeline only sees these two seams; which SDK sits behind
 * them is decided once, by the factories in llm.ts.
 */

import type { EmbeddingProviderType, LLMProviderType } from '../config/schema.js';

export interface CompletionOptions {
  /** System instruction sent ahead of the prompt */
  system?: string;
  /** Overrides llm.max_tokens for this call */
  maxTokens?: number;
  /** Overrides llm.temperature for this call */
  temperature?: number;
  /** Aborts the request; the call rejects with a `cancelled` UpstreamServiceError */
  signal?: AbortSignal;
}

/**
 * Text completion: one prompt in, one string out.
 *
 * Implementations reject with UpstreamServiceError on any failure,
 * including an empty completion (`malformed`).
 */
export interface CompletionService {
  readonly provider: LLMProviderType;
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * Text embeddings. Vectors from one service always share a dimension.
 */
export interface EmbeddingService {
  readonly provider: EmbeddingProviderType;
  readonly model: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  /** Embeds texts in order; batching against the API is the implementation's concern */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}
