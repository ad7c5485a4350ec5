/**
 * Vector Store Tests
 *
 * In-memory search ordering, and SQLite persistence with lazy loading
 * (real database in a temporary directory).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  InMemoryVectorStore,
  SqliteVectorStore,
  createVectorStore,
  cosineSimilarity,
} from '../store.js';
import type { VectorEntry } from '../types.js';
import { ConfigSchema } from '../../config/schema.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';

function entry(id: string, embedding: number[], content = `content ${id}`): VectorEntry {
  return {
    id,
    content,
    metadata: { source: 'faq.txt', index: Number(id.split('#')[1] ?? 0) },
    embedding: new Float32Array(embedding),
  };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('is 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws on a dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});

describe('InMemoryVectorStore', () => {
  it('returns the closest entries first with their similarity', async () => {
    const store = new InMemoryVectorStore();
    await store.add([entry('faq.txt#0', [1, 0]), entry('faq.txt#1', [0, 1]), entry('faq.txt#2', [1, 1])]);

    const results = await store.search([1, 0], 2);

    expect(results.map((r) => r.content)).toEqual(['content faq.txt#0', 'content faq.txt#2']);
    expect(results[0]?.metadata).toEqual({ source: 'faq.txt', index: 0, similarity: 1 });
    expect(results[1]?.metadata.similarity).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it('keeps insertion order for equal similarity', async () => {
    const store = new InMemoryVectorStore();
    await store.add([entry('faq.txt#0', [0, 1]), entry('faq.txt#1', [0, 2])]);

    const results = await store.search([0, 1], 2);
    expect(results.map((r) => r.content)).toEqual(['content faq.txt#0', 'content faq.txt#1']);
  });

  it('replaces entries with the same id', async () => {
    const store = new InMemoryVectorStore();
    await store.add([entry('faq.txt#0', [1, 0], 'old')]);
    await store.add([entry('faq.txt#0', [1, 0], 'new')]);

    expect(await store.count()).toBe(1);
    expect((await store.search([1, 0], 1))[0]?.content).toBe('new');
  });

  it('returns [] for topK <= 0', async () => {
    const store = new InMemoryVectorStore();
    await store.add([entry('faq.txt#0', [1, 0])]);
    expect(await store.search([1, 0], 0)).toEqual([]);
  });

  it('clears all entries', async () => {
    const store = new InMemoryVectorStore();
    await store.add([entry('faq.txt#0', [1, 0])]);
    await store.clear();
    expect(await store.count()).toBe(0);
  });
});

describe('SqliteVectorStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'helpdesk-store-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists entries across connections', async () => {
    const writer = SqliteVectorStore.open(dir);
    await writer.add([entry('faq.txt#0', [0.5, 0.25]), entry('faq.txt#1', [0, 1])]);
    writer.close();

    const reader = SqliteVectorStore.open(dir);
    const results = await reader.search([1, 0.5], 1);
    reader.close();

    expect(existsSync(join(dir, 'index.db'))).toBe(true);
    expect(results).toHaveLength(1);
    expect(results[0]?.content).toBe('content faq.txt#0');
    expect(results[0]?.metadata.index).toBe(0);
    expect(results[0]?.metadata.similarity).toBeCloseTo(1, 6);
  });

  it('keeps the loaded copy in step with later writes', async () => {
    const store = SqliteVectorStore.open(dir);
    await store.add([entry('faq.txt#0', [1, 0])]);
    await store.search([1, 0], 1); // loads

    await store.add([entry('faq.txt#1', [0, 1])]);
    const results = await store.search([0, 1], 1);
    store.close();

    expect(results[0]?.content).toBe('content faq.txt#1');
  });

  it('clears chunks and build facts together', async () => {
    const store = SqliteVectorStore.open(dir);
    await store.add([entry('faq.txt#0', [1, 0])]);
    store.setIndexMeta({ contentHash: 'abc', embeddingModel: 'openai/text-embedding-ada-002' });
    expect(store.getIndexMeta()).toEqual({
      contentHash: 'abc',
      embeddingModel: 'openai/text-embedding-ada-002',
    });

    await store.clear();

    expect(await store.count()).toBe(0);
    expect(store.getIndexMeta()).toEqual({});
    expect(await store.search([1, 0], 1)).toEqual([]);
    store.close();
  });
});

describe('createVectorStore', () => {
  it('creates the in-memory store by default', () => {
    expect(createVectorStore(DEFAULT_CONFIG)).toBeInstanceOf(InMemoryVectorStore);
  });

  it('creates a sqlite store under persist_dir', () => {
    const dir = mkdtempSync(join(tmpdir(), 'helpdesk-store-factory-'));
    const config = ConfigSchema.parse({
      ...DEFAULT_CONFIG,
      vector_store: { backend: 'sqlite', persist_dir: dir },
    });

    const store = createVectorStore(config);
    store.close?.();

    expect(store).toBeInstanceOf(SqliteVectorStore);
    expect(existsSync(join(dir, 'index.db'))).toBe(true);
    rmSync(dir, { recursive: true, force: true });
  });
});
