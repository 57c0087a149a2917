/**
 * The operations the extraction pipeline needs from a PDF library.
 * Documents hold native resources and must be closed by their owner.
 */
export interface PdfCodec {
  /** Parses a PDF from its bytes. Throws if the data is not a readable PDF. */
  openDocument(data: Uint8Array): PdfSourceDocument;
}

export interface PdfSourceDocument {
  readonly pageCount: number;
  /** Plain text of the page at a 0-based index; empty for pages without text. */
  readPageText(index: number): string;
  /** An Info dictionary entry such as `Title` or `Author`, if present. */
  getMetadata(key: string): string | undefined;
  /** Starts an empty document that pages of this one can be copied into. */
  createOutputDocument(): PdfOutputDocument;
  close(): void;
}

export interface PdfOutputDocument {
  readonly pageCount: number;
  /** Copies the page at a 0-based index of the source document, content and resources included. */
  appendPage(sourceIndex: number): void;
  serialize(): Uint8Array;
  close(): void;
}
