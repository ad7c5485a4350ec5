/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run on every open.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded as strings so the build needs no asset copying
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Embedded knowledge-base chunks
CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  content TEXT NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  embedding BLOB NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- How the index was built (content hash, embedding model)
CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations against a database.
 *
 * Each migration runs in its own transaction. A failure is recorded and the
 * remaining migrations still run.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const alreadyApplied = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .all()
      .map((row) => MigrationNameRowSchema.parse(row).name)
  );

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Names of all migrations this build knows about, in order.
 */
export function getMigrationNames(): string[] {
  return MIGRATIONS.map((m) => m.name);
}
