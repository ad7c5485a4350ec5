/**
 * Knowledge Base Loader
 *
 * Reads the support knowledge base (one UTF-8 text file) and chunks it.
 */

import { createHash } from 'node:crypto';
import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { KnowledgeBaseError } from '../errors/index.js';
import type { Config } from '../config/schema.js';
import type { Chunk } from '../search/types.js';
import { expandHome } from '../config/paths.js';
import { chunkText } from './chunker.js';

export interface KnowledgeBase {
  /** Absolute path of the file */
  path: string;
  /** File name, recorded as each chunk's `source` */
  source: string;
  chunks: Chunk[];
  /**
   * SHA-256 over the text and chunking settings. A persisted index built
   * from a different hash is stale.
   */
  contentHash: string;
}

/**
 * Load and chunk the knowledge base.
 *
 * @throws KnowledgeBaseError if the file is missing, unreadable, or yields no chunks
 */
export function loadKnowledgeBase(settings: Config['knowledge_base']): KnowledgeBase {
  const path = resolve(expandHome(settings.path));

  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new KnowledgeBaseError(`Knowledge base not found: ${path}`);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError(`Cannot read knowledge base ${path}: ${reason}`);
  }

  const source = basename(path);
  const chunks = chunkText(text, source, {
    chunkSize: settings.chunk_size,
    chunkOverlap: settings.chunk_overlap,
    separator: settings.separator,
  });

  if (chunks.length === 0) {
    throw new KnowledgeBaseError(
      `Knowledge base is empty: ${path}`,
      'Add support articles to the file, separated by blank lines'
    );
  }

  const contentHash = createHash('sha256')
    .update(JSON.stringify([settings.chunk_size, settings.chunk_overlap, settings.separator]))
    .update(text)
    .digest('hex');

  return { path, source, chunks, contentHash };
}
