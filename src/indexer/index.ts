/**
 * Indexer Module
 *
 * Loads the knowledge base, chunks it, embeds the chunks and writes them to
 * a vector store.
 *
 * @example
 * ```ts
 * import { loadKnowledgeBase, buildIndex } from './indexer/index.js';
 *
 * const kb = loadKnowledgeBase(config.knowledge_base);
 * const { documentStore, chunkCount } = await buildIndex({ knowledgeBase: kb, embedder, store });
 * console.log(`Indexed ${chunkCount} chunks`);
 * ```
 */

// Chunking
export { splitText, chunkText, type ChunkerOptions } from './chunker.js';

// Knowledge base
export { loadKnowledgeBase, type KnowledgeBase } from './knowledge-base.js';

// Embedding
export { embedChunks, chunkId, type EmbedChunksOptions } from './embedder.js';

// Pipeline
export {
  buildIndex,
  embeddingModelKey,
  type BuildIndexOptions,
  type BuildIndexResult,
} from './pipeline.js';
