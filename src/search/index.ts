/**
 * Search Module
 *
 * Vector search over the knowledge base, rank fusion and reranking.
 *
 * - Document store: embeds queries and searches a vector store
 * - Fusion: Reciprocal Rank Fusion over several ranked lists
 * - Reranking: LLM-ordered passages for the final context
 *
 * @example
 * ```typescript
 * import { DocumentStore, InMemoryVectorStore, fuse } from './search/index.js';
 *
 * const store = new DocumentStore(embedder, new InMemoryVectorStore());
 * await store.add(chunks);
 *
 * const fused = fuse([
 *   await store.search('refund timeline', 3),
 *   await store.search('how long until I get my money back', 3),
 * ]);
 * ```
 *
 * @packageDocumentation
 */

// Document store
export { DocumentStore, type DocumentStoreOptions, type AddChunksOptions } from './retriever.js';

// Vector stores
export {
  InMemoryVectorStore,
  SqliteVectorStore,
  createVectorStore,
  cosineSimilarity,
} from './store.js';

// Rank fusion
export { fuse, DEFAULT_RRF_K } from './fusion.js';

// Reranking
export { LLMReranker, parseRanking, buildRerankPrompt, type RerankerOptions } from './reranker.js';

// Types
export type { Chunk, VectorEntry, VectorStore, BaseSearch, IndexBuildProgress } from './types.js';
