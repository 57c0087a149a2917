// src/index.ts for @pagecut/tools-pdf

export { extractPagesTool, runPageExtraction } from './tools/extractPagesTool.js';
export type { ExtractPagesToolInput } from './tools/extractPagesTool.js';
export { extractPagesToolInputSchema } from './tools/extractPagesTool.schema.js';
export { getInfoTool, readPdfInfo } from './tools/getInfoTool.js';
export type { GetInfoResult, GetInfoToolInput } from './tools/getInfoTool.js';
export { getInfoToolInputSchema } from './tools/getInfoTool.schema.js';

export {
  extractPageRange,
  formatExtractionResult,
} from './extraction/extractPageRange.js';
export type {
  ExtractionResult,
  ExtractionStage,
  ExtractPageRangeOptions,
} from './extraction/extractPageRange.js';
export { validateExtractionRequest } from './extraction/validateRequest.js';
export type {
  ExtractionParams,
  ExtractionRequest,
  ValidationResult,
} from './extraction/validateRequest.js';
export { resolvePageRange } from './extraction/resolveRange.js';
export type { PageRange } from './extraction/resolveRange.js';
export { aggregatePages, formatPageRecord } from './extraction/aggregatePages.js';
export type { PageRecord } from './extraction/aggregatePages.js';
export { deriveOutputPath, writeSubDocument } from './extraction/writeSubDocument.js';
export { openPdfDocument } from './extraction/openDocument.js';

export { mupdfCodec } from './codec/mupdfCodec.js';
export type { PdfCodec, PdfOutputDocument, PdfSourceDocument } from './codec/types.js';
export * from './errors.js';
