/**
 * Search Module Types
 *
 * Type definitions for the retrieval pipeline.
 */

/**
 * A piece of knowledge-base text.
 *
 * `content` is the chunk's identity: fusion and deduplication key on it.
 * `metadata` always carries `source`, `index` and `offset`; search adds
 * `similarity`, fusion adds `score`, reranking adds `rerankPosition`.
 */
export interface Chunk {
  content: string;
  metadata: Record<string, unknown>;
}

/**
 * A chunk with its embedding, as written to a vector store.
 */
export interface VectorEntry {
  /** Stable id (`<source>#<index>`) */
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  embedding: Float32Array;
}

/**
 * Nearest-neighbour storage for embedded chunks.
 */
export interface VectorStore {
  add(entries: VectorEntry[]): Promise<void>;
  /** Closest first; cosine similarity in `metadata.similarity` */
  search(queryVector: ArrayLike<number>, topK: number): Promise<Chunk[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
  close?(): void;
}

/**
 * A retrieval function over one query: the seam RAG-Fusion fans out over.
 */
export type BaseSearch = (query: string, k: number, signal?: AbortSignal) => Promise<Chunk[]>;

/**
 * Progress callback for index building.
 */
export interface IndexBuildProgress {
  phase: 'embedding' | 'storing';
  /** Chunks processed so far */
  done: number;
  total: number;
}
