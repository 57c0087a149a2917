import type { PdfOutputDocument, PdfSourceDocument } from '../codec/types.js';
import { CodecError, describeError } from '../errors.js';
import type { PageRange } from './resolveRange.js';

export interface PageRecord {
  /** 1-indexed, as shown to the caller. */
  pageNumber: number;
  text: string;
}

export function formatPageRecord({ pageNumber, text }: PageRecord): string {
  return `--- Page ${pageNumber} ---\n${text}`;
}

/**
 * Reads the text of every page in the range, in ascending order, and copies each
 * page into `output` when one is given. The first page that fails aborts the walk.
 */
export function aggregatePages(
  filePath: string,
  source: PdfSourceDocument,
  range: PageRange,
  output?: PdfOutputDocument,
): PageRecord[] {
  const records: PageRecord[] = [];
  for (let index = range.firstIndex; index <= range.lastIndex; index++) {
    try {
      const text = source.readPageText(index);
      output?.appendPage(index);
      records.push({ pageNumber: index + 1, text });
    } catch (e: unknown) {
      throw new CodecError(filePath, describeError(e), index);
    }
  }
  return records;
}
