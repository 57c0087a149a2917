import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CodecError, NotFoundError, PageRangeError, WriteError } from '../errors.js';
import { FakePdfCodec, decodeFakePdf, encodeFakePdf } from '../testing/fakeCodec.js';
import { type ExtractionStage, extractPageRange, formatExtractionResult } from './extractPageRange.js';
import type { ExtractionRequest } from './validateRequest.js';

const FIVE_PAGES = ['first page', 'second page', 'third page', 'fourth page', 'fifth page'];

describe('extractPageRange', () => {
  let tempDir: string;
  let reportPath: string;
  let codec: FakePdfCodec;

  function request(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
    return { filePath: reportPath, startPage: 1, endPage: 1, saveOutput: false, ...overrides };
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'pagecut-extract-'));
    reportPath = path.join(tempDir, 'report.pdf');
    await writeFile(reportPath, encodeFakePdf({ pages: FIVE_PAGES }));
    codec = new FakePdfCodec();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return the records of the requested pages in ascending order', async () => {
    const result = await extractPageRange(request({ startPage: 2, endPage: 3 }), { codec });

    expect(result).toEqual({
      pages: [
        { pageNumber: 2, text: 'second page' },
        { pageNumber: 3, text: 'third page' },
      ],
    });
    expect(codec.opened[0]?.pagesRead).toEqual([1, 2]);
  });

  it('should not write any file when saving is not requested', async () => {
    await extractPageRange(request({ startPage: 2, endPage: 3 }), { codec });
    expect(await readdir(tempDir)).toEqual(['report.pdf']);
    expect(codec.opened[0]?.outputs).toHaveLength(0);
  });

  it('should produce one record per page for every valid range', async () => {
    for (let start = 1; start <= 5; start++) {
      for (let end = start; end <= 5; end++) {
        const { pages } = await extractPageRange(request({ startPage: start, endPage: end }), { codec });
        expect(pages.map((page) => page.pageNumber)).toEqual(
          Array.from({ length: end - start + 1 }, (_, i) => start + i),
        );
      }
    }
  });

  it('should format records under the content header', async () => {
    const result = await extractPageRange(request({ startPage: 2, endPage: 3 }), { codec });
    expect(formatExtractionResult(result)).toBe(
      'Content from new PDF:\n\n--- Page 2 ---\nsecond page\n--- Page 3 ---\nthird page',
    );
  });

  it('should keep pages without text as empty records', async () => {
    await writeFile(reportPath, encodeFakePdf({ pages: ['', 'text after a scan'] }));
    const result = await extractPageRange(request({ endPage: 2 }), { codec });
    expect(formatExtractionResult(result)).toBe(
      'Content from new PDF:\n\n--- Page 1 ---\n\n--- Page 2 ---\ntext after a scan',
    );
  });

  it('should give identical results for identical calls', async () => {
    const first = await extractPageRange(request({ startPage: 1, endPage: 4 }), { codec });
    const second = await extractPageRange(request({ startPage: 1, endPage: 4 }), { codec });
    expect(second).toEqual(first);
    expect(codec.opened).toHaveLength(2);
    expect(codec.opened[0]).not.toBe(codec.opened[1]);
  });

  it('should close the source document after success', async () => {
    await extractPageRange(request(), { codec });
    expect(codec.opened[0]?.closed).toBe(true);
  });

  it('should fail with PageRangeError naming requested and available pages', async () => {
    const extraction = extractPageRange(request({ startPage: 1, endPage: 10 }), { codec });
    await expect(extraction).rejects.toBeInstanceOf(PageRangeError);
    await expect(extraction).rejects.toThrow('Requested page 10 exceeds the document length (5 pages).');
    expect(codec.opened[0]?.pagesRead).toEqual([]);
    expect(codec.opened[0]?.closed).toBe(true);
  });

  it('should fail with NotFoundError before the codec is used', async () => {
    const missing = path.join(tempDir, 'missing.pdf');
    await expect(extractPageRange(request({ filePath: missing }), { codec })).rejects.toThrow(
      new NotFoundError(missing),
    );
    expect(codec.opened).toHaveLength(0);
  });

  it('should fail with CodecError when the document cannot be parsed', async () => {
    await writeFile(reportPath, 'definitely not a pdf');
    const extraction = extractPageRange(request(), { codec });
    await expect(extraction).rejects.toBeInstanceOf(CodecError);
    await expect(extraction).rejects.toThrow(`Error reading PDF '${reportPath}': `);
  });

  it('should abort on the first page that fails and release the document', async () => {
    await writeFile(reportPath, encodeFakePdf({ pages: ['a', null, 'c'] }));
    const extraction = extractPageRange(request({ endPage: 3, saveOutput: true }), { codec });

    await expect(extraction).rejects.toThrow(
      `Error reading page 2 of PDF '${reportPath}': content stream is damaged`,
    );
    const source = codec.opened[0];
    expect(source?.pagesRead).toEqual([0, 1]);
    expect(source?.closed).toBe(true);
    expect(source?.outputs[0]?.closed).toBe(true);
    expect(await readdir(tempDir)).toEqual(['report.pdf']);
  });

  it('should save the selected pages beside the source when requested', async () => {
    const result = await extractPageRange(request({ startPage: 2, endPage: 4, saveOutput: true }), {
      codec,
    });

    const expectedPath = path.join(tempDir, 'report_pgs_2-4.pdf');
    expect(result.outputPath).toBe(expectedPath);
    expect(result.pages).toHaveLength(3);
    const saved = decodeFakePdf(await readFile(expectedPath));
    expect(saved.pages).toEqual(['second page', 'third page', 'fourth page']);
    expect(codec.opened[0]?.outputs[0]?.closed).toBe(true);
  });

  it('should abort the whole operation when the output cannot be written', async () => {
    // A directory where the output file should go makes the write fail
    await mkdir(path.join(tempDir, 'report_pgs_1-2.pdf'));
    const extraction = extractPageRange(request({ endPage: 2, saveOutput: true }), { codec });

    await expect(extraction).rejects.toBeInstanceOf(WriteError);
    expect(codec.opened[0]?.closed).toBe(true);
    expect(codec.opened[0]?.outputs[0]?.closed).toBe(true);
  });

  it('should report each stage as it is entered', async () => {
    const stages: ExtractionStage[] = [];
    await extractPageRange(request({ saveOutput: true }), {
      codec,
      onStage: (stage) => stages.push(stage),
    });
    expect(stages).toEqual(['opening', 'resolving', 'aggregating', 'writing']);

    const withoutSave: ExtractionStage[] = [];
    await extractPageRange(request(), { codec, onStage: (stage) => withoutSave.push(stage) });
    expect(withoutSave).toEqual(['opening', 'resolving', 'aggregating']);
  });
});
