import { BaseContextSchema, defineTool, textPart, validateAndResolvePath } from '@pagecut/tools-core';
import type { Part, ToolExecuteOptions } from '@pagecut/tools-core';
import type { z } from 'zod';
import { mupdfCodec } from '../codec/mupdfCodec.js';
import type { PdfCodec } from '../codec/types.js';
import { ValidationError, describeError } from '../errors.js';
import {
  type ExtractionStage,
  extractPageRange,
  formatExtractionResult,
} from '../extraction/extractPageRange.js';
import { validateExtractionRequest } from '../extraction/validateRequest.js';
import { extractPagesToolInputSchema } from './extractPagesTool.schema.js';

export type ExtractPagesToolInput = z.infer<typeof extractPagesToolInputSchema>;

const TOOL_NAME = 'extract-pages';

function log(message: string): void {
  console.error(`[${TOOL_NAME}] ${message}`);
}

function fail(message: string, stage: 'validating' | ExtractionStage): string {
  log(`Failed while ${stage}: ${message}`);
  return `Error: ${message}`;
}

/**
 * Validates the arguments, extracts the requested pages and formats the outcome.
 * Never rejects: every failure is returned as a string starting with `Error`.
 */
export async function runPageExtraction(
  args: unknown,
  context: ToolExecuteOptions,
  codec: PdfCodec = mupdfCodec,
): Promise<string> {
  const parsed = extractPagesToolInputSchema.safeParse(args);
  if (!parsed.success) {
    const errorMessages = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    return fail(new ValidationError(errorMessages).message, 'validating');
  }

  const { file_path, start_page, end_page, save_output, save_pdf } = parsed.data;
  const validation = validateExtractionRequest({
    filePath: file_path,
    startPage: start_page,
    endPage: end_page,
    saveOutput: save_output ?? save_pdf,
  });
  if (!validation.success) {
    return fail(validation.error.message, 'validating');
  }
  const request = validation.data;

  const resolvedPath = validateAndResolvePath(
    request.filePath,
    context.workspaceRoot,
    context.allowOutsideWorkspace,
  );
  if (typeof resolvedPath !== 'string') {
    return fail(new ValidationError(resolvedPath.error).message, 'validating');
  }

  log(`Extracting pages ${request.startPage}-${request.endPage} from '${resolvedPath}'...`);
  let stage: ExtractionStage = 'opening';
  try {
    const result = await extractPageRange(
      { ...request, filePath: resolvedPath },
      {
        codec,
        onStage: (next) => {
          stage = next;
        },
      },
    );
    if (result.outputPath) {
      log(`Created new PDF: ${result.outputPath}`);
    }
    return formatExtractionResult(result);
  } catch (e: unknown) {
    return fail(describeError(e), stage);
  }
}

export const extractPagesTool = defineTool({
  name: TOOL_NAME,
  description:
    'Open a PDF file and extract a page range (start_page to end_page, 1-indexed, inclusive) as text. ' +
    'By default only the first page is extracted. With save_output, the selected pages are also ' +
    'saved as <name>_pgs_<start>-<end>.pdf next to the source file.',
  inputSchema: extractPagesToolInputSchema,
  contextSchema: BaseContextSchema,
  execute: async ({
    context,
    args,
  }: { context: ToolExecuteOptions; args: ExtractPagesToolInput }): Promise<Part[]> => {
    return [textPart(await runPageExtraction(args, context))];
  },
});
