/**
 * Database Module
 *
 * SQLite storage for the persisted vector index.
 *
 * @example
 * ```ts
 * import { openDatabase, runMigrations, IndexOperations } from './database/index.js';
 *
 * const db = openDatabase(path);
 * runMigrations(db);
 * const ops = new IndexOperations(db);
 * ```
 */

// Connection management
export { openDatabase, closeDatabase } from './connection.js';

// Migrations
export { runMigrations, getMigrationNames, type MigrationResult } from './migrate.js';

// Schema types and conversion
export type { ChunkRow, IndexMetaRow } from './schema.js';
export { embeddingToBlob, blobToEmbedding } from './schema.js';

// Validation schemas and utilities
export {
  ChunkRowSchema,
  IndexMetaRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

// Operations
export { IndexOperations, type IndexMeta } from './operations.js';
