/**
 * Vector Stores
 *
 * Two backends behind the VectorStore interface:
 * - InMemoryVectorStore: brute-force cosine similarity, rebuilt every start
 * - SqliteVectorStore: persists entries in SQLite and searches an in-memory
 *   copy loaded lazily on first use
 */

import type Database from 'better-sqlite3';
import { openDatabase, closeDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import { IndexOperations, type IndexMeta } from '../database/operations.js';
import { DatabaseError } from '../errors/index.js';
import { getIndexDbPath } from '../config/paths.js';
import type { Config } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';
import type { Chunk, VectorEntry, VectorStore } from './types.js';

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ============================================================================
// IN-MEMORY
// ============================================================================

export class InMemoryVectorStore implements VectorStore {
  private entries = new Map<string, VectorEntry>();

  async add(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.id, entry);
    }
  }

  /**
   * Closest first. Equal similarities keep insertion order.
   */
  async search(queryVector: ArrayLike<number>, topK: number): Promise<Chunk[]> {
    if (topK <= 0) return [];
    return [...this.entries.values()]
      .map((entry) => ({ entry, similarity: cosineSimilarity(queryVector, entry.embedding) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK)
      .map(({ entry, similarity }) => ({
        content: entry.content,
        metadata: { ...entry.metadata, similarity },
      }));
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

// ============================================================================
// SQLITE
// ============================================================================

/**
 * SQLite-backed store. Writes go to disk immediately; searches run against
 * an in-memory copy that is loaded once and kept in step with writes.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly ops: IndexOperations;
  private memory: InMemoryVectorStore | null = null;

  constructor(
    private readonly db: Database.Database,
    logger?: Logger
  ) {
    const migrations = runMigrations(db);
    const [failed] = migrations.failed;
    if (failed) {
      throw new DatabaseError(`Index migration ${failed.name} failed: ${failed.error}`);
    }
    this.ops = new IndexOperations(db, logger);
  }

  /**
   * Open the index file under a persist directory.
   */
  static open(persistDir: string, logger?: Logger): SqliteVectorStore {
    return new SqliteVectorStore(openDatabase(getIndexDbPath(persistDir)), logger);
  }

  private async loaded(): Promise<InMemoryVectorStore> {
    if (!this.memory) {
      const memory = new InMemoryVectorStore();
      await memory.add(this.ops.loadChunks());
      this.memory = memory;
    }
    return this.memory;
  }

  async add(entries: VectorEntry[]): Promise<void> {
    this.ops.insertChunks(entries);
    if (this.memory) {
      await this.memory.add(entries);
    }
  }

  async search(queryVector: ArrayLike<number>, topK: number): Promise<Chunk[]> {
    return (await this.loaded()).search(queryVector, topK);
  }

  async count(): Promise<number> {
    return this.ops.countChunks();
  }

  async clear(): Promise<void> {
    this.ops.clear();
    this.memory = null;
  }

  getIndexMeta(): IndexMeta {
    return this.ops.getIndexMeta();
  }

  setIndexMeta(meta: Required<IndexMeta>): void {
    this.ops.setIndexMeta(meta);
  }

  close(): void {
    closeDatabase(this.db);
  }
}

/**
 * Create the store selected by vector_store.backend.
 */
export function createVectorStore(config: Config, logger?: Logger): VectorStore {
  const backend = config.vector_store.backend;
  switch (backend) {
    case 'memory':
      return new InMemoryVectorStore();
    case 'sqlite':
      return SqliteVectorStore.open(config.vector_store.persist_dir, logger);
    default: {
      const _exhaustiveCheck: never = backend;
      throw new Error(`Unknown vector store backend: ${String(_exhaustiveCheck)}`);
    }
  }
}
