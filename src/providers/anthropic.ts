/**
 * Anthropic Completion Provider
 *
 * Completion service over the official `@anthropic-ai/sdk` Messages API.
 * Anthropic has no embeddings endpoint; pair it with an OpenAI or Gemini
 * embedding service.
 *
 * SECURITY: The API key is passed straight to the SDK client and never logged.
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from '@anthropic-ai/sdk';
import { UpstreamServiceError } from '../errors/index.js';
import { withTimeout } from '../utils/timeout.js';
import { createComponentLogger } from '../utils/logger.js';
import { toUpstreamError, type SdkErrorClasses } from './errors.js';
import type { CompletionOptions, CompletionService } from './types.js';

const logger = createComponentLogger('anthropic-provider');

const ANTHROPIC_ERRORS: SdkErrorClasses = {
  APIUserAbortError,
  APIConnectionTimeoutError,
  APIConnectionError,
  RateLimitError,
  AuthenticationError,
  PermissionDeniedError,
  APIError,
};

export interface AnthropicCompletionOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export class AnthropicCompletionService implements CompletionService {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(options: AnthropicCompletionOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = options.timeoutMs;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 2,
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let text: string | undefined;
    try {
      const response = await withTimeout(
        (signal) =>
          this.client.messages.create(
            {
              model: this.model,
              max_tokens: options.maxTokens ?? this.maxTokens,
              temperature: options.temperature ?? this.temperature,
              system: options.system,
              messages: [{ role: 'user', content: prompt }],
            },
            { signal }
          ),
        this.timeoutMs,
        { label: 'anthropic completion', signal: options.signal }
      );
      const textBlock = response.content.find((block) => block.type === 'text');
      text = textBlock?.type === 'text' ? textBlock.text : undefined;
    } catch (error) {
      const upstream = toUpstreamError(this.provider, error, ANTHROPIC_ERRORS, options.signal);
      logger.debug({ provider: this.provider, model: this.model, kind: upstream.kind }, 'Completion failed');
      throw upstream;
    }

    if (!text) {
      throw new UpstreamServiceError(this.provider, 'malformed', 'no text content returned');
    }
    return text;
  }
}
