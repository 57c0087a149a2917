/**
 * Errors raised by the page extraction pipeline.
 * Each carries a suggestion for the caller, shown alongside the message.
 */

export class PdfToolError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'PdfToolError';
  }
}

/** Malformed caller input, detected before any file is touched. */
export class ValidationError extends PdfToolError {
  constructor(public readonly reason: string) {
    super(`Invalid input parameters - ${reason}`, 'Check file_path, start_page and end_page.');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PdfToolError {
  constructor(public readonly path: string) {
    super(`File '${path}' does not exist`, 'Ensure the file path is correct and the file exists.');
    this.name = 'NotFoundError';
  }
}

/** The document could not be read, or one of its pages did not yield text. */
export class CodecError extends PdfToolError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    public readonly pageIndex?: number,
  ) {
    super(
      pageIndex === undefined
        ? `Error reading PDF '${path}': ${reason}`
        : `Error reading page ${pageIndex + 1} of PDF '${path}': ${reason}`,
      'Ensure the file is a valid, uncorrupted PDF document.',
    );
    this.name = 'CodecError';
  }
}

/** Named to avoid shadowing the built-in RangeError. */
export class PageRangeError extends PdfToolError {
  constructor(
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(
      `Requested page ${requested} exceeds the document length (${available} pages).`,
      `Choose an end_page between 1 and ${available}.`,
    );
    this.name = 'PageRangeError';
  }
}

export class WriteError extends PdfToolError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(
      `Failed to write PDF '${path}': ${reason}`,
      'Check write permissions and free space in the directory of the source file.',
    );
    this.name = 'WriteError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
