/**
 * Query Expander
 *
 * Rewrites one customer question into several search queries, so that
 * RAG-Fusion can retrieve with each and fuse the rankings.
 *
 * @example
 * ```typescript
 * const expander = new QueryExpander(completion);
 * await expander.expand('Why was my card declined?', 3);
 * // → ['card declined reasons', 'payment rejected at checkout', 'card blocked after failed PIN']
 * ```
 */

import type { CompletionService } from '../providers/types.js';
import { isCancellation } from '../providers/errors.js';
import type { Logger } from '../utils/logger.js';
import { buildQueryExpansionPrompt } from './prompts.js';

/**
 * Split model output into queries: one per non-blank line, trimmed, in
 * model order, capped at `k`. Duplicates are kept.
 */
export function parseQueryList(raw: string, k: number): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, k);
}

export interface QueryExpanderOptions {
  logger?: Logger;
}

export class QueryExpander {
  private readonly logger?: Logger;

  constructor(
    private readonly completion: CompletionService,
    options: QueryExpanderOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Generate up to `k` queries for a question.
   *
   * Returns [] when the model fails or answers with nothing usable; the
   * caller then searches with the question itself. A cancelled request
   * rejects.
   *
   * @throws Error if k is not an integer >= 1
   */
  async expand(question: string, k: number, signal?: AbortSignal): Promise<string[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new Error(`Query count must be an integer >= 1, got ${k}`);
    }

    let raw: string;
    try {
      raw = await this.completion.complete(buildQueryExpansionPrompt(question, k), { signal });
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Query expansion failed: ${reason}`);
      return [];
    }

    const queries = parseQueryList(raw, k);
    if (queries.length === 0) {
      this.logger?.warn('Query expansion returned no queries');
    } else {
      this.logger?.debug?.(`Expanded into ${queries.length} queries: ${JSON.stringify(queries)}`);
    }
    return queries;
  }
}
