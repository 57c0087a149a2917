import type { PdfCodec, PdfOutputDocument } from '../codec/types.js';
import { type PageRecord, aggregatePages, formatPageRecord } from './aggregatePages.js';
import { openPdfDocument } from './openDocument.js';
import { resolvePageRange } from './resolveRange.js';
import type { ExtractionRequest } from './validateRequest.js';
import { deriveOutputPath, writeSubDocument } from './writeSubDocument.js';

export interface ExtractionResult {
  /** Ascending by page number. */
  pages: PageRecord[];
  /** Where the extracted pages were saved, when saving was requested. */
  outputPath?: string;
}

export type ExtractionStage = 'opening' | 'resolving' | 'aggregating' | 'writing';

export interface ExtractPageRangeOptions {
  codec: PdfCodec;
  /** Called as the pipeline enters each stage. */
  onStage?: (stage: ExtractionStage) => void;
}

/**
 * Runs a validated request to completion: open, resolve the range, collect page text
 * and, if requested, write the selected pages to a new PDF beside the source.
 * Either every step succeeds or the first error is thrown; documents opened along
 * the way are closed on every path.
 */
export async function extractPageRange(
  request: ExtractionRequest,
  { codec, onStage }: ExtractPageRangeOptions,
): Promise<ExtractionResult> {
  const { filePath, startPage, endPage, saveOutput } = request;

  onStage?.('opening');
  const source = await openPdfDocument(filePath, codec);
  let output: PdfOutputDocument | undefined;
  try {
    onStage?.('resolving');
    const range = resolvePageRange(startPage, endPage, source.pageCount);

    onStage?.('aggregating');
    output = saveOutput ? source.createOutputDocument() : undefined;
    const pages = aggregatePages(filePath, source, range, output);

    if (!output) {
      return { pages };
    }

    onStage?.('writing');
    const outputPath = deriveOutputPath(filePath, startPage, endPage);
    await writeSubDocument(output, outputPath);
    return { pages, outputPath };
  } finally {
    output?.close();
    source.close();
  }
}

export function formatExtractionResult(result: ExtractionResult): string {
  return `Content from new PDF:\n\n${result.pages.map(formatPageRecord).join('\n')}`;
}
