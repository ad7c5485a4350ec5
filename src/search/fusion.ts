/**
 * Reciprocal Rank Fusion (RRF)
 *
 * Merges the ranked lists retrieved for several query variants into one
 * ranking, using rank positions rather than raw similarity scores.
 *
 * RRF Formula: score(d) = Σ 1/(rank(d) + k), rank zero-based
 *
 * Reference: Cormack, Clarke & Büttcher (2009)
 * "Reciprocal Rank Fusion outperforms Condorcet and individual Rank Learning Methods"
 */

import type { Chunk } from './types.js';

/** Standard RRF smoothing constant */
export const DEFAULT_RRF_K = 60;

/**
 * Fuse ranked chunk lists.
 *
 * Chunks are identified by content. A chunk that appears in several lists,
 * or several times in one list, gets every contribution summed. The result
 * is sorted by descending fused score; equal scores keep first-seen order.
 * Each output chunk carries the metadata of its first occurrence plus
 * `score`.
 *
 * @param rankedLists - Lists ordered best-first
 * @param k - Smoothing constant; must be finite and > 0
 * @throws Error if k is not a finite positive number
 *
 * @example
 * ```typescript
 * fuse([[x, y], [y, z]]);
 * // → [y, x, z]  (y: 1/61 + 1/60, x: 1/60, z: 1/61)
 * ```
 */
export function fuse(rankedLists: readonly (readonly Chunk[])[], k: number = DEFAULT_RRF_K): Chunk[] {
  if (!Number.isFinite(k) || k <= 0) {
    throw new Error(`RRF constant k must be a finite number > 0, got ${k}`);
  }

  // Map iteration order is insertion order, which gives the tie-break
  const table = new Map<string, { score: number; first: Chunk }>();

  for (const list of rankedLists) {
    list.forEach((chunk, rank) => {
      const contribution = 1 / (rank + k);
      const entry = table.get(chunk.content);
      if (entry) {
        entry.score += contribution;
      } else {
        table.set(chunk.content, { score: contribution, first: chunk });
      }
    });
  }

  // Array.prototype.sort is stable
  return [...table.entries()]
    .sort(([, a], [, b]) => b.score - a.score)
    .map(([content, { score, first }]) => ({
      content,
      metadata: { ...first.metadata, score },
    }));
}
