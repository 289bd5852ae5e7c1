import { InvalidConfigError } from './errors.js';
import type { Segment } from './types.js';

export interface ChunkingOptions {
  /** Maximum characters per segment. */
  size: number;
  /** Characters shared by consecutive segments. Must be smaller than `size`. */
  overlap: number;
}

export function validateChunkingOptions(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidConfigError(`Chunk size must be a positive integer, got ${size}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new InvalidConfigError(
      `Chunk overlap must be an integer in [0, ${size}), got ${overlap}.`,
    );
  }
}

/**
 * Splits text into fixed-size windows that advance by `size - overlap`.
 * The window that reaches the end of the text is the last one, so every segment
 * except possibly the final one is exactly `size` characters long.
 */
export function chunkText(text: string, size: number, overlap: number): Segment[] {
  validateChunkingOptions(size, overlap);
  if (text.length === 0) return [];

  const segments: Segment[] = [];
  const step = size - overlap;
  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + size, text.length);
    segments.push({ index: segments.length, text: text.substring(start, end), start, end });
    if (end === text.length) break;
    start += step;
  }
  return segments;
}

/** Reassembles the original text from segments produced by {@link chunkText}. */
export function mergeSegments(segments: readonly Segment[]): string {
  let merged = '';
  let covered = 0;
  for (const segment of segments) {
    if (segment.end <= covered) continue;
    merged += segment.text.substring(Math.max(0, covered - segment.start));
    covered = segment.end;
  }
  return merged;
}
