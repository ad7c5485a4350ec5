/**
 * Index Pipeline
 *
 * Orchestrates the indexing workflow:
 * Load → Chunk → Embed → Store
 *
 * The pipeline doesn't know how progress is displayed; it fires callbacks.
 * A persisted (sqlite) index is reused when it was built from the same
 * knowledge-base content and embedding model.
 */

import type { EmbeddingService } from '../providers/types.js';
import { DocumentStore } from '../search/retriever.js';
import { SqliteVectorStore } from '../search/store.js';
import type { IndexBuildProgress, VectorStore } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import type { KnowledgeBase } from './knowledge-base.js';

export interface BuildIndexOptions {
  knowledgeBase: KnowledgeBase;
  embedder: EmbeddingService;
  store: VectorStore;
  /** Texts per embedding request (default: 64) */
  batchSize?: number;
  /** Rebuild even when the persisted index is current */
  force?: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: IndexBuildProgress) => void;
  logger?: Logger;
}

export interface BuildIndexResult {
  documentStore: DocumentStore;
  chunkCount: number;
  /** True when an up-to-date persisted index was used as is */
  reused: boolean;
  durationMs: number;
}

/**
 * Identifies the embedding space an index was built in.
 */
export function embeddingModelKey(embedder: EmbeddingService): string {
  return `${embedder.provider}/${embedder.model}`;
}

async function isCurrent(
  store: SqliteVectorStore,
  knowledgeBase: KnowledgeBase,
  embedder: EmbeddingService
): Promise<boolean> {
  const meta = store.getIndexMeta();
  return (
    meta.contentHash === knowledgeBase.contentHash &&
    meta.embeddingModel === embeddingModelKey(embedder) &&
    (await store.count()) > 0
  );
}

/**
 * Build (or reuse) the vector index for a knowledge base.
 *
 * @example
 * ```typescript
 * const { documentStore, reused } = await buildIndex({
 *   knowledgeBase: loadKnowledgeBase(config.knowledge_base),
 *   embedder,
 *   store: createVectorStore(config),
 *   batchSize: config.embedding.batch_size,
 * });
 * ```
 */
export async function buildIndex(options: BuildIndexOptions): Promise<BuildIndexResult> {
  const { knowledgeBase, embedder, store, batchSize, force = false, signal, onProgress, logger } =
    options;
  const startTime = Date.now();
  const documentStore = new DocumentStore(embedder, store, { batchSize });

  if (!force && store instanceof SqliteVectorStore && (await isCurrent(store, knowledgeBase, embedder))) {
    const chunkCount = await store.count();
    logger?.debug?.(`Reusing persisted index (${chunkCount} chunks)`);
    return { documentStore, chunkCount, reused: true, durationMs: Date.now() - startTime };
  }

  // Clearing also drops the build facts, so an interrupted rebuild is never reused
  await store.clear();
  await documentStore.add(knowledgeBase.chunks, { signal, onProgress });

  if (store instanceof SqliteVectorStore) {
    store.setIndexMeta({
      contentHash: knowledgeBase.contentHash,
      embeddingModel: embeddingModelKey(embedder),
    });
  }

  const chunkCount = await store.count();
  logger?.info?.(`Indexed ${chunkCount} chunks from ${knowledgeBase.source}`);
  return { documentStore, chunkCount, reused: false, durationMs: Date.now() - startTime };
}
