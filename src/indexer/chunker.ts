/**
 * Recursive Character Chunker
 *
 * Splits knowledge-base text into overlapping chunks. The text is split on
 * the first separator it contains (paragraph break by default); pieces that
 * are still too long are split again with the next separator, down to single
 * characters. Neighbouring pieces are then merged back up to `chunkSize`,
 * carrying up to `chunkOverlap` characters into the next chunk.
 */

import type { Chunk } from '../search/types.js';

export interface ChunkerOptions {
  /** Maximum chunk length in characters */
  chunkSize: number;
  /** Characters shared by neighbouring chunks */
  chunkOverlap: number;
  /** Preferred split point, tried before "\n", " " and "" */
  separator?: string;
}

/** Fallback separators after the configured one */
const FALLBACK_SEPARATORS = ['\n', ' ', ''];

function separatorsFor(preferred: string): string[] {
  return [...new Set([preferred, ...FALLBACK_SEPARATORS])];
}

/**
 * Merge small pieces into chunks of at most `size` characters.
 */
function mergePieces(pieces: string[], separator: string, size: number, overlap: number): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const joinedLength = (piece: string): number =>
    piece.length + (current.length > 0 ? separator.length : 0);

  for (const piece of pieces) {
    if (current.length > 0 && total + joinedLength(piece) > size) {
      chunks.push(current.join(separator));
      // Drop from the front until what is left fits as overlap
      while (total > overlap || (total > 0 && total + joinedLength(piece) > size)) {
        const first = current.shift();
        if (first === undefined) break;
        total -= first.length + (current.length > 0 ? separator.length : 0);
      }
    }
    total += joinedLength(piece);
    current.push(piece);
  }

  if (current.length > 0) {
    chunks.push(current.join(separator));
  }
  return chunks;
}

function splitRecursive(text: string, separators: string[], size: number, overlap: number): string[] {
  let separator = '';
  let remaining: string[] = [];
  for (const [i, candidate] of separators.entries()) {
    if (candidate === '' || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces = separator === '' ? [...text] : text.split(separator);
  const output: string[] = [];
  let small: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= size) {
      small.push(piece);
      continue;
    }
    if (small.length > 0) {
      output.push(...mergePieces(small, separator, size, overlap));
      small = [];
    }
    if (remaining.length === 0) {
      output.push(piece);
    } else {
      output.push(...splitRecursive(piece, remaining, size, overlap));
    }
  }

  if (small.length > 0) {
    output.push(...mergePieces(small, separator, size, overlap));
  }
  return output;
}

/**
 * Split text into trimmed, non-empty chunk strings.
 *
 * @throws Error if chunkOverlap is not smaller than chunkSize
 */
export function splitText(text: string, options: ChunkerOptions): string[] {
  const { chunkSize, chunkOverlap, separator = '\n\n' } = options;
  if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new Error(`Invalid chunking: size ${chunkSize}, overlap ${chunkOverlap}`);
  }

  return splitRecursive(text, separatorsFor(separator), chunkSize, chunkOverlap)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

/**
 * Chunk a document, recording where each chunk came from.
 *
 * Metadata: `source` (document name), `index` (chunk position) and
 * `offset` (character offset of the chunk in `text`).
 *
 * @example
 * ```typescript
 * chunkText('Refunds take 5 days.\n\nCards ship in 7 days.', 'faq.txt', {
 *   chunkSize: 24,
 *   chunkOverlap: 0,
 * });
 * // → [{ content: 'Refunds take 5 days.', metadata: { source: 'faq.txt', index: 0, offset: 0 } },
 * //    { content: 'Cards ship in 7 days.', metadata: { source: 'faq.txt', index: 1, offset: 22 } }]
 * ```
 */
export function chunkText(text: string, source: string, options: ChunkerOptions): Chunk[] {
  let searchFrom = 0;
  return splitText(text, options).map((content, index) => {
    let offset = text.indexOf(content, searchFrom);
    if (offset < 0) offset = text.indexOf(content);
    searchFrom = offset + 1;
    return { content, metadata: { source, index, offset } };
  });
}
