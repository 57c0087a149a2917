import type { PdfCodec, PdfOutputDocument, PdfSourceDocument } from '../codec/types.js';

/**
 * Stand-in codec for tests. A "document" is JSON: each page is its text, or null for
 * a page that fails to read. Anything that is not such JSON fails to open.
 */
export interface FakePdfContent {
  pages: (string | null)[];
  metadata?: Record<string, string>;
}

export function encodeFakePdf(content: FakePdfContent): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(content));
}

export function decodeFakePdf(data: Uint8Array): FakePdfContent {
  const parsed: unknown = JSON.parse(new TextDecoder().decode(data));
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('pages' in parsed) ||
    !Array.isArray(parsed.pages)
  ) {
    throw new Error('no pages array');
  }
  const pages = parsed.pages.map((page: unknown) => (typeof page === 'string' ? page : null));
  const metadata: Record<string, string> = {};
  if ('metadata' in parsed && typeof parsed.metadata === 'object' && parsed.metadata !== null) {
    for (const [key, value] of Object.entries(parsed.metadata)) {
      if (typeof value === 'string') metadata[key] = value;
    }
  }
  return { pages, metadata };
}

export class FakeOutputDocument implements PdfOutputDocument {
  readonly pages: (string | null)[] = [];
  closed = false;
  failOnSerialize = false;

  constructor(private readonly source: FakeSourceDocument) {}

  get pageCount(): number {
    return this.pages.length;
  }

  appendPage(sourceIndex: number): void {
    const page = this.source.content.pages[sourceIndex];
    if (page === undefined) throw new Error(`no page at index ${sourceIndex}`);
    this.pages.push(page);
  }

  serialize(): Uint8Array {
    if (this.failOnSerialize) throw new Error('serializer exploded');
    return encodeFakePdf({ pages: this.pages });
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeSourceDocument implements PdfSourceDocument {
  readonly pagesRead: number[] = [];
  readonly outputs: FakeOutputDocument[] = [];
  closed = false;

  constructor(readonly content: FakePdfContent) {}

  get pageCount(): number {
    return this.content.pages.length;
  }

  readPageText(index: number): string {
    this.pagesRead.push(index);
    const page = this.content.pages[index];
    if (page === undefined) throw new Error(`no page at index ${index}`);
    if (page === null) throw new Error('content stream is damaged');
    return page;
  }

  getMetadata(key: string): string | undefined {
    return this.content.metadata?.[key];
  }

  createOutputDocument(): FakeOutputDocument {
    const output = new FakeOutputDocument(this);
    this.outputs.push(output);
    return output;
  }

  close(): void {
    this.closed = true;
  }
}

export class FakePdfCodec implements PdfCodec {
  readonly opened: FakeSourceDocument[] = [];

  openDocument(data: Uint8Array): FakeSourceDocument {
    const doc = new FakeSourceDocument(decodeFakePdf(data));
    this.opened.push(doc);
    return doc;
  }
}
