/**
 * Connection, migration and embedding-blob tests.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { closeDatabase, openDatabase } from '../connection.js';
import { getMigrationNames, runMigrations } from '../migrate.js';
import { blobToEmbedding, embeddingToBlob } from '../schema.js';

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'helpdesk-db-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe('openDatabase', () => {
  it('creates missing parent directories', () => {
    const dbPath = join(testDir, 'nested', 'index', 'index.db');
    const db = openDatabase(dbPath);

    expect(existsSync(dbPath)).toBe(true);
    closeDatabase(db);
  });

  it('closes idempotently', () => {
    const db = openDatabase(':memory:');
    closeDatabase(db);
    closeDatabase(db);
    expect(db.open).toBe(false);
  });
});

describe('runMigrations', () => {
  it('applies every migration once', () => {
    const db = openDatabase(':memory:');

    expect(runMigrations(db)).toEqual({ applied: getMigrationNames(), failed: [] });
    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => (row as { name: string }).name);
    expect(tables).toEqual(expect.arrayContaining(['_migrations', 'chunks', 'index_meta']));
    closeDatabase(db);
  });
});

describe('embedding blobs', () => {
  it('stores four bytes per dimension', () => {
    const blob = embeddingToBlob(new Float32Array([0.5, -1, 2]));
    expect(blob.byteLength).toBe(12);
    expect(Array.from(blobToEmbedding(blob))).toEqual([0.5, -1, 2]);
  });

  it('reads a blob that is not 4-byte aligned', () => {
    const source = embeddingToBlob(new Float32Array([0.25, 4]));
    const padded = Buffer.alloc(source.byteLength + 1);
    source.copy(padded, 1);

    expect(Array.from(blobToEmbedding(padded.subarray(1)))).toEqual([0.25, 4]);
  });
});
