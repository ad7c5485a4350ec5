/**
 * Test Fakes
 *
 * In-process stand-ins for the completion and embedding services, so tests
 * exercise the retrieval pipeline without any network access.
 */

import type { EmbeddingProviderType, LLMProviderType } from '../config/schema.js';
import type {
  CompletionOptions,
  CompletionService,
  EmbedOptions,
  EmbeddingService,
} from '../providers/types.js';

/**
 * Bag-of-words embeddings over a fixed vocabulary.
 *
 * Each dimension counts one vocabulary word in the text (case-insensitive),
 * so texts sharing words are close and texts sharing none score 0.
 *
 * @example
 * ```typescript
 * const embedder = new FakeEmbeddingService(['refund', 'card']);
 * await embedder.embed('Refund my card refund'); // [2, 1]
 * ```
 */
export class FakeEmbeddingService implements EmbeddingService {
  readonly provider: EmbeddingProviderType = 'openai';
  readonly model: string;
  /** Every embedBatch call's texts, in order */
  readonly calls: string[][] = [];
  /** When set, every call rejects with it */
  error?: Error;

  constructor(
    private readonly vocabulary: string[],
    model: string = 'fake-embedding'
  ) {
    this.model = model;
  }

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z0-9]+/);
    return this.vocabulary.map((term) => words.filter((word) => word === term).length);
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    return vector ?? [];
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    options.signal?.throwIfAborted();
    this.calls.push(texts);
    if (this.error) throw this.error;
    return texts.map((text) => this.vectorFor(text));
  }
}

export interface RecordedCompletion {
  prompt: string;
  options: CompletionOptions;
}

type Reply = string | Error | ((prompt: string, options: CompletionOptions) => string | Promise<string>);

/**
 * Scripted completions.
 *
 * A string reply is returned for every prompt, an Error is thrown, and a
 * function computes the reply from the prompt.
 */
export class FakeCompletionService implements CompletionService {
  readonly provider: LLMProviderType = 'openai';
  readonly model = 'fake-llm';
  readonly calls: RecordedCompletion[] = [];

  constructor(private reply: Reply = '') {}

  setReply(reply: Reply): void {
    this.reply = reply;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();
    this.calls.push({ prompt, options });
    if (this.reply instanceof Error) throw this.reply;
    if (typeof this.reply === 'function') return this.reply(prompt, options);
    return this.reply;
  }
}
