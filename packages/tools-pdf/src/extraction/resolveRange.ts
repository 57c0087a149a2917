import { PageRangeError } from '../errors.js';

/** 0-based, inclusive on both ends. */
export interface PageRange {
  readonly firstIndex: number;
  readonly lastIndex: number;
}

/**
 * Maps a validated 1-indexed page range onto page indices.
 * Ranges past the end of the document are rejected, never clamped.
 */
export function resolvePageRange(startPage: number, endPage: number, pageCount: number): PageRange {
  if (endPage > pageCount) {
    throw new PageRangeError(endPage, pageCount);
  }
  return { firstIndex: startPage - 1, lastIndex: endPage - 1 };
}
