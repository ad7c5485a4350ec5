/**
 * RAG-Fusion Retrieval
 *
 * ```
 * question → QueryExpander → [q1 … qN]
 *          → baseSearch(qi, perQueryK) for every qi, concurrently
 *          → fuse(lists, rrfK)
 * ```
 *
 * The base search is a plain function so HyDE or plain vector search can
 * sit underneath without this module knowing which.
 */

import { fuse, DEFAULT_RRF_K } from '../search/fusion.js';
import type { BaseSearch, Chunk } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import type { QueryExpander } from './query-expander.js';

export interface FusedRetrievalOptions {
  expander: QueryExpander;
  /** Results requested from each sub-search (rag.per_query_k) */
  perQueryK: number;
  /** RRF constant (rag.rrf_k) */
  rrfK?: number;
  /** Forwarded to the expander; aborting it aborts every sub-search */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Expand, search each query concurrently, and fuse the rankings.
 *
 * Falls back to the question alone when expansion yields nothing. Fusion
 * only runs once every sub-search has finished: if any of them rejects, or
 * the signal aborts, the whole call rejects and the remaining sub-searches
 * are aborted.
 */
export async function retrieveFused(
  question: string,
  baseSearch: BaseSearch,
  kQueries: number,
  options: FusedRetrievalOptions
): Promise<Chunk[]> {
  const { expander, perQueryK, rrfK = DEFAULT_RRF_K, signal, logger } = options;

  const expanded = await expander.expand(question, kQueries, signal);
  const queries = expanded.length > 0 ? expanded : [question];

  // Sub-searches share one controller so a failure in one cancels the rest
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  let rankedLists: Chunk[][];
  try {
    rankedLists = await Promise.all(
      queries.map(async (query) => {
        try {
          return await baseSearch(query, perQueryK, controller.signal);
        } catch (error) {
          controller.abort(error);
          throw error;
        }
      })
    );
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
  signal?.throwIfAborted();

  const fused = fuse(rankedLists, rrfK);
  logger?.debug?.(`Fused ${rankedLists.length} result lists into ${fused.length} chunks`);
  return fused;
}
