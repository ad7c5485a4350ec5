/**
 * Database Operations
 *
 * Type-safe operations on the SQLite index. Handles:
 * - Type conversion (Float32Array ↔ Buffer)
 * - JSON serialization/deserialization of chunk metadata
 * - Transaction management for batch writes
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { blobToEmbedding, embeddingToBlob } from './schema.js';
import {
  ChunkRowSchema,
  CountRowSchema,
  IndexMetaRowSchema,
  validateRow,
  validateRows,
} from './validation.js';
import { safeJsonParse } from '../utils/json.js';
import type { Logger } from '../utils/logger.js';
import type { VectorEntry } from '../search/types.js';

const MetadataSchema = z.record(z.unknown());

/**
 * Facts recorded about a built index.
 */
export interface IndexMeta {
  contentHash?: string;
  embeddingModel?: string;
}

/**
 * Operations on one index database.
 *
 * @example
 * ```ts
 * const ops = new IndexOperations(openDatabase(path));
 * ops.insertChunks(entries);
 * ops.setIndexMeta({ contentHash, embeddingModel: 'text-embedding-ada-002' });
 * ```
 */
export class IndexOperations {
  constructor(
    private readonly db: Database.Database,
    private readonly logger?: Logger
  ) {}

  /**
   * Insert or replace chunks in one transaction.
   */
  insertChunks(entries: VectorEntry[]): void {
    const insert = this.db.prepare(
      'INSERT OR REPLACE INTO chunks (id, content, metadata, embedding) VALUES (?, ?, ?, ?)'
    );
    this.db.transaction((batch: VectorEntry[]) => {
      for (const entry of batch) {
        insert.run(entry.id, entry.content, JSON.stringify(entry.metadata), embeddingToBlob(entry.embedding));
      }
    })(entries);
  }

  /**
   * Load every chunk with its embedding, in insertion order.
   * Unreadable metadata degrades to `{}` with a warning.
   */
  loadChunks(): VectorEntry[] {
    const rows = validateRows(
      ChunkRowSchema,
      this.db.prepare('SELECT id, content, metadata, embedding FROM chunks ORDER BY rowid').all(),
      'chunks'
    );
    return rows.map((row) => ({
      id: row.id,
      content: row.content,
      metadata: safeJsonParse(row.metadata, MetadataSchema, {}, (error) =>
        this.logger?.warn(`Corrupt metadata for chunk ${row.id}: ${error.message}`)
      ),
      embedding: blobToEmbedding(row.embedding),
    }));
  }

  countChunks(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM chunks').get();
    return validateRow(CountRowSchema, row, 'chunks.count').count;
  }

  /**
   * Remove all chunks and build facts.
   */
  clear(): void {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM chunks').run();
      this.db.prepare('DELETE FROM index_meta').run();
    })();
  }

  getIndexMeta(): IndexMeta {
    const rows = validateRows(
      IndexMetaRowSchema,
      this.db.prepare('SELECT key, value FROM index_meta').all(),
      'index_meta'
    );
    const meta: IndexMeta = {};
    for (const row of rows) {
      if (row.key === 'content_hash') meta.contentHash = row.value;
      else if (row.key === 'embedding_model') meta.embeddingModel = row.value;
    }
    return meta;
  }

  setIndexMeta(meta: Required<IndexMeta>): void {
    const upsert = this.db.prepare('INSERT OR REPLACE INTO index_meta (key, value) VALUES (?, ?)');
    this.db.transaction(() => {
      upsert.run('content_hash', meta.contentHash);
      upsert.run('embedding_model', meta.embeddingModel);
    })();
  }
}
