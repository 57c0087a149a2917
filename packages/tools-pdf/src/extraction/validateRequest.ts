import { ValidationError } from '../errors.js';

/** Caller-supplied arguments before validation; page numbers are 1-indexed. */
export interface ExtractionParams {
  filePath: string;
  startPage?: number;
  endPage?: number;
  saveOutput?: boolean;
}

export interface ExtractionRequest {
  readonly filePath: string;
  readonly startPage: number;
  readonly endPage: number;
  readonly saveOutput: boolean;
}

export type ValidationResult =
  | { success: true; data: ExtractionRequest }
  | { success: false; error: ValidationError };

const DEFAULT_START_PAGE = 1;
const DEFAULT_END_PAGE = 1;

type Rule = (request: ExtractionRequest) => string | undefined;

// Checked in order; the first failing rule decides the reason
const rules: Rule[] = [
  ({ filePath }) => (filePath.trim() === '' ? 'empty path' : undefined),
  ({ startPage }) => (Number.isInteger(startPage) ? undefined : 'start_page must be an integer'),
  ({ endPage }) => (Number.isInteger(endPage) ? undefined : 'end_page must be an integer'),
  ({ startPage }) => (startPage < 1 ? 'start_page below 1' : undefined),
  ({ endPage }) => (endPage < 1 ? 'end_page below 1' : undefined),
  ({ startPage, endPage }) => (endPage < startPage ? 'end_page less than start_page' : undefined),
];

/**
 * Applies defaults and checks the extraction arguments without touching the filesystem.
 * Defaults extract the first page only.
 */
export function validateExtractionRequest(params: ExtractionParams): ValidationResult {
  const request: ExtractionRequest = Object.freeze({
    filePath: params.filePath,
    startPage: params.startPage ?? DEFAULT_START_PAGE,
    endPage: params.endPage ?? DEFAULT_END_PAGE,
    saveOutput: params.saveOutput ?? false,
  });

  for (const rule of rules) {
    const reason = rule(request);
    if (reason !== undefined) {
      return { success: false, error: new ValidationError(reason) };
    }
  }
  return { success: true, data: request };
}
