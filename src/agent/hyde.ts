/**
 * HyDE (Hypothetical Document Embeddings)
 *
 * Instead of embedding the question, the model first writes a plausible
 * answer and that text is embedded: answers sit closer to knowledge-base
 * articles in embedding space than questions do.
 */

import type { CompletionService } from '../providers/types.js';
import { isCancellation } from '../providers/errors.js';
import type { DocumentStore } from '../search/retriever.js';
import type { BaseSearch, Chunk } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import { buildHydePrompt } from './prompts.js';

export interface HypotheticalAnswerOptions {
  logger?: Logger;
}

export class HypotheticalAnswerGenerator {
  private readonly logger?: Logger;

  constructor(
    private readonly completion: CompletionService,
    options: HypotheticalAnswerOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Text to search with: the hypothetical answer, or the question itself
   * when generation fails or comes back empty.
   */
  async generate(question: string, signal?: AbortSignal): Promise<string> {
    let text: string;
    try {
      text = (await this.completion.complete(buildHydePrompt(question), { signal })).trim();
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`HyDE generation failed, searching with the question: ${reason}`);
      return question;
    }

    if (!text) {
      this.logger?.warn('HyDE generation returned no text, searching with the question');
      return question;
    }
    return text;
  }
}

/**
 * Search by hypothetical answer.
 *
 * @example
 * ```typescript
 * const hyde = new HydeRetriever(new HypotheticalAnswerGenerator(completion), documentStore);
 * const chunks = await hyde.search('Can I get a refund after 30 days?', 3);
 * ```
 */
export class HydeRetriever {
  constructor(
    private readonly generator: HypotheticalAnswerGenerator,
    private readonly store: DocumentStore
  ) {}

  async search(question: string, k: number, signal?: AbortSignal): Promise<Chunk[]> {
    const hypothetical = await this.generator.generate(question, signal);
    return this.store.searchByText(hypothetical, k, signal);
  }

  asBaseSearch(): BaseSearch {
    return (query, k, signal) => this.search(query, k, signal);
  }
}
