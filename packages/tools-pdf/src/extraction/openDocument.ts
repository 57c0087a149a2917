import { access, readFile } from 'node:fs/promises';
import type { PdfCodec, PdfSourceDocument } from '../codec/types.js';
import { CodecError, NotFoundError, describeError } from '../errors.js';

/**
 * Opens the PDF at `filePath`. Existence is checked before the codec sees any bytes,
 * so a missing file is reported as such rather than as a parse failure.
 * The caller owns the returned document and must close it.
 */
export async function openPdfDocument(filePath: string, codec: PdfCodec): Promise<PdfSourceDocument> {
  try {
    await access(filePath);
  } catch {
    throw new NotFoundError(filePath);
  }

  let data: Uint8Array;
  try {
    data = await readFile(filePath);
  } catch (e: unknown) {
    throw new CodecError(filePath, describeError(e));
  }

  try {
    return codec.openDocument(data);
  } catch (e: unknown) {
    throw new CodecError(filePath, describeError(e));
  }
}
