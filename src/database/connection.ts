/**
 * Database Connection Module
 *
 * Opens the SQLite index file used by the `sqlite` vector-store backend.
 * The file lives at <vector_store.persist_dir>/index.db.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError } from '../errors/index.js';

/**
 * Open (creating if needed) a SQLite database with the settings the index uses.
 * Pass ':memory:' for a throwaway database.
 *
 * @throws DatabaseError if the file cannot be opened
 *
 * @example
 * ```ts
 * const db = openDatabase(getIndexDbPath(config.vector_store.persist_dir));
 * runMigrations(db);
 * ```
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    // WAL for concurrent reads while the server answers queries
    db.pragma('journal_mode = WAL');
    return db;
  } catch (error) {
    throw new DatabaseError(
      `Cannot open index database at ${dbPath}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Close a database. Safe to call on an already-closed connection.
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
