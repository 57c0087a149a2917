import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { PdfOutputDocument } from '../codec/types.js';
import { WriteError, describeError } from '../errors.js';

/**
 * `/docs/report.pdf` with pages 2-3 becomes `/docs/report_pgs_2-3.pdf`.
 */
export function deriveOutputPath(inputPath: string, startPage: number, endPage: number): string {
  const extension = path.extname(inputPath);
  const stem = path.basename(inputPath, extension);
  return path.join(path.dirname(inputPath), `${stem}_pgs_${startPage}-${endPage}${extension}`);
}

/** Serializes `output` to `outputPath`, replacing any existing file. */
export async function writeSubDocument(output: PdfOutputDocument, outputPath: string): Promise<void> {
  try {
    await writeFile(outputPath, output.serialize());
  } catch (e: unknown) {
    throw new WriteError(outputPath, describeError(e));
  }
}
