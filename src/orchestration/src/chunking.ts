/**
 * Page-aware chunking module
 * Splits page text into chunks of a target size with overlap:
 * - Recursive splitting at paragraph, then sentence, then word boundaries
 * - Hard character cuts only when a single word exceeds the target size
 * - Chunks never cross a page, so every chunk keeps the page it came from
 *
 * Chunks are slices of the normalized page text, never re-joined fragments.
 */

import { ChunkingConfig, PageText, TextChunk } from './types';
import { logger } from './logger';

interface Range {
  start: number;
  end: number;
}

const SEPARATORS: RegExp[] = [
  /\n[ \t]*\n\s*/g, // paragraphs
  /(?<=[.!?])\s+/g, // sentences
  /\s+/g // words
];

/**
 * Collapse the whitespace noise PDF extraction leaves behind
 */
export function normalizePageText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t\f\v\u00a0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Split [start, end) of text on a separator, returning the non-separator pieces
 */
function splitRange(text: string, range: Range, separator: RegExp): Range[] {
  const slice = text.slice(range.start, range.end);
  const pieces: Range[] = [];
  let cursor = 0;

  for (const match of slice.matchAll(separator)) {
    const index = match.index ?? cursor;
    if (index > cursor) {
      pieces.push({ start: range.start + cursor, end: range.start + index });
    }
    cursor = index + match[0].length;
  }

  if (cursor < slice.length) {
    pieces.push({ start: range.start + cursor, end: range.end });
  }

  return pieces;
}

/**
 * Recursively break a range into units no longer than maxSize
 * Tries paragraphs first, then sentences, then words, then hard cuts
 */
function splitIntoUnits(text: string, range: Range, maxSize: number, level: number = 0): Range[] {
  if (range.end - range.start <= maxSize) {
    return [range];
  }

  if (level >= SEPARATORS.length) {
    const cuts: Range[] = [];
    for (let start = range.start; start < range.end; start += maxSize) {
      cuts.push({ start, end: Math.min(start + maxSize, range.end) });
    }
    return cuts;
  }

  const pieces = splitRange(text, range, SEPARATORS[level]);
  if (pieces.length <= 1) {
    const only = pieces[0] ?? range;
    return splitIntoUnits(text, only, maxSize, level + 1);
  }

  return pieces.flatMap(piece => splitIntoUnits(text, piece, maxSize, level + 1));
}

/**
 * Find where the next chunk should start so that it repeats roughly `overlap`
 * characters of the previous one, beginning on a word
 */
function overlapStart(text: string, previous: Range, overlap: number, nextUnitStart: number): number {
  let index = Math.max(previous.end - overlap, previous.start + 1);

  while (index < nextUnitStart) {
    const startsWord = !/\s/.test(text[index]) && (index === 0 || /\s/.test(text[index - 1]));
    if (startsWord) {
      return index;
    }
    index++;
  }

  return nextUnitStart;
}

/**
 * Greedily pack units into chunks of at most maxSize characters
 */
function packUnits(text: string, units: Range[], maxSize: number, overlap: number): Range[] {
  const chunks: Range[] = [];
  let next = 0;
  let previous: Range | null = null;

  while (next < units.length) {
    let start = units[next].start;

    if (previous && overlap > 0) {
      const candidate = overlapStart(text, previous, overlap, units[next].start);
      if (units[next].end - candidate <= maxSize) {
        start = candidate;
      }
    }

    let last = next;
    while (last + 1 < units.length && units[last + 1].end - start <= maxSize) {
      last++;
    }

    previous = { start, end: units[last].end };
    chunks.push(previous);
    next = last + 1;
  }

  return chunks;
}

/**
 * Split a single piece of text into overlapping chunks
 */
export function chunkText(text: string, config: ChunkingConfig): string[] {
  const { chunkSize, overlap } = config;

  if (chunkSize <= 0) {
    throw new Error(`Chunk size must be positive, got ${chunkSize}`);
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new Error(`Chunk overlap must be in [0, ${chunkSize}), got ${overlap}`);
  }

  if (!text || text.trim().length === 0) {
    return [];
  }

  const units = splitIntoUnits(text, { start: 0, end: text.length }, chunkSize);
  return packUnits(text, units, chunkSize, overlap)
    .map(range => text.slice(range.start, range.end))
    .filter(chunk => chunk.trim().length > 0);
}

/**
 * Chunk every page of a document, keeping source file and page number on each chunk
 */
export function chunkPages(pages: PageText[], config: ChunkingConfig): TextChunk[] {
  const chunks: TextChunk[] = [];

  for (const page of pages) {
    const pageChunks = chunkText(normalizePageText(page.text), config);

    for (const text of pageChunks) {
      chunks.push({ text, sourceFile: page.sourceFile, pageNumber: page.pageNumber });
    }
  }

  if (pages.length > 0) {
    logger.debug(
      `Chunked ${pages.length} pages of ${pages[0].sourceFile} into ${chunks.length} chunks ` +
        `(size=${config.chunkSize}, overlap=${config.overlap})`
    );
  }

  return chunks;
}
