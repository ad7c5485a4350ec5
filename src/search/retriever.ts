/**
 * Document Store
 *
 * High-level search API over an embedding service and a vector store.
 * Handles batch embedding on write and query embedding on search.
 */

import { embedChunks } from '../indexer/embedder.js';
import type { EmbeddingService } from '../providers/types.js';
import type { BaseSearch, Chunk, IndexBuildProgress, VectorStore } from './types.js';

export interface DocumentStoreOptions {
  /** Texts per embedding request when adding chunks (default: 64) */
  batchSize?: number;
}

export interface AddChunksOptions {
  signal?: AbortSignal;
  onProgress?: (progress: IndexBuildProgress) => void;
}

/**
 * Semantic search over the knowledge base.
 *
 * @example
 * ```typescript
 * const store = new DocumentStore(embedder, new InMemoryVectorStore());
 * await store.add(kb.chunks);
 *
 * const results = await store.search('how do I get a refund?', 3);
 * console.log(results[0]?.metadata.similarity);
 * ```
 */
export class DocumentStore {
  private readonly batchSize: number;

  constructor(
    private readonly embedder: EmbeddingService,
    private readonly vectors: VectorStore,
    options: DocumentStoreOptions = {}
  ) {
    this.batchSize = options.batchSize ?? 64;
  }

  /**
   * Embed chunks and write them to the vector store.
   */
  async add(chunks: Chunk[], options: AddChunksOptions = {}): Promise<void> {
    const { signal, onProgress } = options;
    const entries = await embedChunks(chunks, this.embedder, {
      batchSize: this.batchSize,
      signal,
      onProgress: (done, total) => onProgress?.({ phase: 'embedding', done, total }),
    });

    onProgress?.({ phase: 'storing', done: 0, total: entries.length });
    await this.vectors.add(entries);
    onProgress?.({ phase: 'storing', done: entries.length, total: entries.length });
  }

  /**
   * Embed the query and return the `k` closest chunks, closest first.
   */
  async search(query: string, k: number, signal?: AbortSignal): Promise<Chunk[]> {
    if (k <= 0) return [];
    const vector = await this.embedder.embed(query, { signal });
    signal?.throwIfAborted();
    return this.vectors.search(vector, k);
  }

  /**
   * Search by the embedding of arbitrary text, such as a hypothetical answer.
   */
  async searchByText(text: string, k: number, signal?: AbortSignal): Promise<Chunk[]> {
    return this.search(text, k, signal);
  }

  async count(): Promise<number> {
    return this.vectors.count();
  }

  /** Release the vector store (closes a sqlite file) */
  close(): void {
    this.vectors.close?.();
  }

  /**
   * Plain search as a BaseSearch function.
   */
  asBaseSearch(): BaseSearch {
    return (query, k, signal) => this.search(query, k, signal);
  }
}
