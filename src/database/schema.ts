/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite table schemas.
 */

// ============================================================================
// Chunks Table
// ============================================================================

/**
 * An embedded knowledge-base chunk.
 */
export interface ChunkRow {
  /** `<source>#<index>` */
  id: string;
  content: string;
  /** JSON object */
  metadata: string;
  /** Binary Float32Array embedding (BLOB) */
  embedding: Buffer;
}

// ============================================================================
// Index Metadata Table
// ============================================================================

/**
 * Key/value facts about how the index was built.
 * An index is reusable only while both keys still match.
 */
export interface IndexMetaRow {
  key: 'content_hash' | 'embedding_model';
  value: string;
}

// ============================================================================
// Embedding Conversion
// ============================================================================

/**
 * Convert Float32Array to Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob(embedding);
 * db.prepare('INSERT INTO chunks (embedding) VALUES (?)').run(blob);
 * ```
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 *
 * Copies the bytes: SQLite buffers are not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}
