import { ChunkingConfigError } from '../errors.js';

export const MIN_CHUNK_CHARS = 100;
export const SENTENCE_LOOKBACK = 150;

const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s.,!?\-:;()]/gu;
const SENTENCE_END = new Set(['.', '!', '?']);

/**
 * Strips characters outside the allow-list (letters, digits, underscore,
 * whitespace and `. , ! ? - : ; ( )`), then collapses whitespace and trims.
 * Removal runs first so a dropped character never leaves a double space.
 */
export function normalizeText(text: string): string {
  return collapseWhitespace(text.replace(DISALLOWED_CHARS, ''));
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function assertChunkingParams(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ChunkingConfigError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ChunkingConfigError(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
  }
}

/**
 * Splits already-normalized content into overlapping windows. A window that
 * stops short of the end is pulled back to just after the last `.`, `!` or `?`
 * found in its final SENTENCE_LOOKBACK characters.
 */
export function chunkText(content: string, chunkSize = 600, overlap = 150): string[] {
  assertChunkingParams(chunkSize, overlap);

  const chunks: string[] = [];
  let start = 0;

  while (start < content.length) {
    let end = start + chunkSize;

    if (end < content.length) {
      // never cut at or before start + overlap, so the next window always moves forward
      const lowest = Math.max(end - SENTENCE_LOOKBACK, start + overlap);
      for (let i = end - 1; i >= lowest; i--) {
        if (SENTENCE_END.has(content[i])) {
          end = i + 1;
          break;
        }
      }
    }

    const chunk = content.slice(start, end).trim();
    if (chunk.length > MIN_CHUNK_CHARS) chunks.push(chunk);

    start = end - overlap;
  }

  return chunks;
}
