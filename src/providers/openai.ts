/**
 * OpenAI-compatible Providers
 *
 * Completion and embedding services over the official `openai` SDK.
 * Gemini is served through Google's OpenAI-compatible endpoint, so the
 * same classes cover both providers.
 *
 * SECURITY: API keys are passed straight to the SDK client and never logged.
 */

import {
  OpenAI,
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';
import { UpstreamServiceError } from '../errors/index.js';
import { withTimeout } from '../utils/timeout.js';
import { createComponentLogger } from '../utils/logger.js';
import { toUpstreamError, type SdkErrorClasses } from './errors.js';
import type {
  CompletionOptions,
  CompletionService,
  EmbedOptions,
  EmbeddingService,
} from './types.js';

const logger = createComponentLogger('openai-provider');

/** Google's OpenAI-compatible endpoint for Gemini models */
export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

const OPENAI_ERRORS: SdkErrorClasses = {
  APIUserAbortError,
  APIConnectionTimeoutError,
  APIConnectionError,
  RateLimitError,
  AuthenticationError,
  PermissionDeniedError,
  APIError,
};

export type OpenAICompatibleProvider = 'openai' | 'gemini';

interface ClientOptions {
  provider: OpenAICompatibleProvider;
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Overrides the provider's default endpoint */
  baseURL?: string;
}

function createClient(options: ClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL ?? (options.provider === 'gemini' ? GEMINI_BASE_URL : undefined),
    timeout: options.timeoutMs,
    maxRetries: 2,
  });
}

// ============================================================================
// COMPLETIONS
// ============================================================================

export interface OpenAICompletionOptions extends ClientOptions {
  temperature: number;
  maxTokens: number;
}

export class OpenAICompletionService implements CompletionService {
  readonly provider: OpenAICompatibleProvider;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(options: OpenAICompletionOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = options.timeoutMs;
    this.client = createClient(options);
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    let content: string | null | undefined;
    try {
      const response = await withTimeout(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.model,
              messages,
              temperature: options.temperature ?? this.temperature,
              max_tokens: options.maxTokens ?? this.maxTokens,
            },
            { signal }
          ),
        this.timeoutMs,
        { label: `${this.provider} completion`, signal: options.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      const upstream = toUpstreamError(this.provider, error, OPENAI_ERRORS, options.signal);
      logger.debug({ provider: this.provider, model: this.model, kind: upstream.kind }, 'Completion failed');
      throw upstream;
    }

    if (!content) {
      throw new UpstreamServiceError(this.provider, 'malformed', 'no content in completion');
    }
    return content;
  }
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

export interface OpenAIEmbeddingOptions extends ClientOptions {
  batchSize: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  readonly provider: OpenAICompatibleProvider;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(options: OpenAIEmbeddingOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.batchSize = options.batchSize;
    this.timeoutMs = options.timeoutMs;
    this.client = createClient(options);
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) {
      throw new UpstreamServiceError(this.provider, 'malformed', 'no embedding returned');
    }
    return vector;
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.embedOneBatch(batch, options.signal)));
    }
    return vectors;
  }

  private async embedOneBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    let data: Array<{ index: number; embedding: number[] }>;
    try {
      const response = await withTimeout(
        (innerSignal) =>
          this.client.embeddings.create({ model: this.model, input: batch }, { signal: innerSignal }),
        this.timeoutMs,
        { label: `${this.provider} embedding`, signal }
      );
      data = response.data;
    } catch (error) {
      throw toUpstreamError(this.provider, error, OPENAI_ERRORS, signal);
    }

    if (data.length !== batch.length) {
      throw new UpstreamServiceError(
        this.provider,
        'malformed',
        `expected ${batch.length} embeddings, got ${data.length}`
      );
    }
    return [...data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
