/**
 * Reranker Service
 *
 * Asks the completion model to order retrieved passages by relevance.
 * Scoring the query and passage together gives sharper ordering than
 * embedding similarity alone, at the cost of one extra completion call.
 *
 * @example
 * ```typescript
 * const reranker = new LLMReranker(completion, { candidateCount: 10 });
 *
 * // After RRF fusion returns its candidates
 * const top = await reranker.rerank('How do refunds work?', fused, 3);
 * ```
 */

import type { CompletionService } from '../providers/types.js';
import { isCancellation } from '../providers/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Chunk } from './types.js';

/**
 * Default number of candidates to rerank.
 */
const DEFAULT_CANDIDATE_COUNT = 10;

/** Passages are truncated in the prompt to keep it bounded */
const MAX_PASSAGE_CHARS = 800;

export interface RerankerOptions {
  /** Maximum number of chunks shown to the model (search.rerank_candidates) */
  candidateCount?: number;
  logger?: Logger;
}

export function buildRerankPrompt(query: string, candidates: readonly Chunk[]): string {
  const passages = candidates
    .map((chunk, i) => `[${i + 1}] ${chunk.content.slice(0, MAX_PASSAGE_CHARS)}`)
    .join('\n\n');

  return `Rank the passages below by how well they answer the customer's question.

Question: ${query}

Passages:
${passages}

Reply with the passage numbers only, most relevant first, separated by commas.`;
}

/**
 * Parse the model's ranking into zero-based candidate positions.
 *
 * Numbers out of range and repeats are ignored; candidates the model did
 * not mention follow in their original order.
 *
 * @example
 * ```typescript
 * parseRanking('3, 1, 9, 3', 4); // → [2, 0, 1, 3]
 * ```
 */
export function parseRanking(raw: string, candidateCount: number): number[] {
  const order: number[] = [];
  const seen = new Set<number>();

  for (const match of raw.matchAll(/\d+/g)) {
    const position = Number.parseInt(match[0], 10) - 1;
    if (position >= 0 && position < candidateCount && !seen.has(position)) {
      seen.add(position);
      order.push(position);
    }
  }

  for (let position = 0; position < candidateCount; position++) {
    if (!seen.has(position)) order.push(position);
  }
  return order;
}

/**
 * LLM-based reranker.
 *
 * Reranking is an enhancement: when the completion call fails the original
 * order is kept (logged at warn). A cancelled request still rejects.
 */
export class LLMReranker {
  private readonly candidateCount: number;
  private readonly logger?: Logger;

  constructor(
    private readonly completion: CompletionService,
    options: RerankerOptions = {}
  ) {
    this.candidateCount = options.candidateCount ?? DEFAULT_CANDIDATE_COUNT;
    this.logger = options.logger;
  }

  /**
   * Rerank chunks and return the best `topN`, each with `rerankPosition`
   * (zero-based) in its metadata.
   */
  async rerank(query: string, chunks: readonly Chunk[], topN: number, signal?: AbortSignal): Promise<Chunk[]> {
    if (chunks.length === 0 || topN <= 0) {
      return [];
    }

    const candidates = chunks.slice(0, this.candidateCount);
    let order: number[];

    try {
      const raw = await this.completion.complete(buildRerankPrompt(query, candidates), {
        temperature: 0,
        signal,
      });
      order = parseRanking(raw, candidates.length);
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Reranking failed, keeping retrieval order: ${reason}`);
      return chunks.slice(0, topN);
    }

    return order.slice(0, topN).flatMap((position, rerankPosition) => {
      const chunk = candidates[position];
      return chunk ? [{ content: chunk.content, metadata: { ...chunk.metadata, rerankPosition } }] : [];
    });
  }
}
