/**
 * Embedder Orchestration
 *
 * Turns chunks into VectorEntry records by computing embeddings in batches.
 * This is the bridge between the chunker and the vector store.
 */

import { UpstreamServiceError } from '../errors/index.js';
import type { EmbeddingService } from '../providers/types.js';
import type { Chunk, VectorEntry } from '../search/types.js';

/** Default batch size */
const DEFAULT_BATCH_SIZE = 64;

export interface EmbedChunksOptions {
  batchSize?: number;
  signal?: AbortSignal;
  /** Called after each batch with chunks embedded so far */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Stable id for a chunk: `<source>#<index>`, falling back to its position.
 */
export function chunkId(chunk: Chunk, position: number): string {
  const { source, index } = chunk.metadata;
  return typeof source === 'string' && typeof index === 'number'
    ? `${source}#${index}`
    : `chunk#${position}`;
}

/**
 * Embed chunks batch by batch.
 *
 * Unlike search-time calls there is no fallback here: an index missing
 * chunks would answer from partial knowledge, so any failure rejects.
 *
 * @throws UpstreamServiceError from the embedding service, or `malformed`
 *   when a vector comes back empty
 *
 * @example
 * ```typescript
 * const entries = await embedChunks(kb.chunks, embedder, {
 *   batchSize: 64,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 */
export async function embedChunks(
  chunks: Chunk[],
  service: EmbeddingService,
  options: EmbedChunksOptions = {}
): Promise<VectorEntry[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, signal, onProgress } = options;
  const entries: VectorEntry[] = [];

  for (let start = 0; start < chunks.length; start += batchSize) {
    signal?.throwIfAborted();

    const batch = chunks.slice(start, start + batchSize);
    const vectors = await service.embedBatch(
      batch.map((chunk) => chunk.content),
      { signal }
    );

    batch.forEach((chunk, offset) => {
      const vector = vectors[offset];
      if (!vector || vector.length === 0) {
        throw new UpstreamServiceError(
          service.provider,
          'malformed',
          `empty embedding for chunk ${chunkId(chunk, start + offset)}`
        );
      }
      entries.push({
        id: chunkId(chunk, start + offset),
        content: chunk.content,
        metadata: chunk.metadata,
        embedding: new Float32Array(vector),
      });
    });

    onProgress?.(entries.length, chunks.length);
  }

  return entries;
}
