import * as mupdf from 'mupdf';
import type { PdfCodec, PdfOutputDocument, PdfSourceDocument } from './types.js';

class MupdfOutputDocument implements PdfOutputDocument {
  private readonly doc = new mupdf.PDFDocument();

  constructor(private readonly source: mupdf.PDFDocument) {}

  get pageCount(): number {
    return this.doc.countPages();
  }

  appendPage(sourceIndex: number): void {
    // -1 appends after the last page
    this.doc.graftPage(-1, this.source, sourceIndex);
  }

  serialize(): Uint8Array {
    const buffer = this.doc.saveToBuffer('compress');
    try {
      // Copy out of the WASM heap before the buffer is freed
      return buffer.asUint8Array().slice();
    } finally {
      buffer.destroy();
    }
  }

  close(): void {
    this.doc.destroy();
  }
}

class MupdfSourceDocument implements PdfSourceDocument {
  constructor(private readonly doc: mupdf.PDFDocument) {}

  get pageCount(): number {
    return this.doc.countPages();
  }

  readPageText(index: number): string {
    const page = this.doc.loadPage(index);
    try {
      const structuredText = page.toStructuredText('preserve-whitespace');
      try {
        return structuredText.asText();
      } finally {
        structuredText.destroy();
      }
    } finally {
      page.destroy();
    }
  }

  getMetadata(key: string): string | undefined {
    const value = this.doc.getMetaData(`info:${key}`);
    return value ? value : undefined;
  }

  createOutputDocument(): PdfOutputDocument {
    return new MupdfOutputDocument(this.doc);
  }

  close(): void {
    this.doc.destroy();
  }
}

/** PDF codec backed by MuPDF. */
export const mupdfCodec: PdfCodec = {
  openDocument(data: Uint8Array): PdfSourceDocument {
    const doc = mupdf.Document.openDocument(data, 'application/pdf');
    const pdf = doc.asPDF();
    if (!pdf) {
      doc.destroy();
      throw new Error('not a PDF document');
    }
    if (pdf.needsPassword()) {
      pdf.destroy();
      throw new Error('password-protected documents are not supported');
    }
    return new MupdfSourceDocument(pdf);
  },
};
