import { BaseContextSchema, defineTool, jsonPart, validateAndResolvePath } from '@pagecut/tools-core';
import type { Part, ToolExecuteOptions } from '@pagecut/tools-core';
import { z } from 'zod';
import { mupdfCodec } from '../codec/mupdfCodec.js';
import type { PdfCodec } from '../codec/types.js';
import { PdfToolError, describeError } from '../errors.js';
import { openPdfDocument } from '../extraction/openDocument.js';
import { getInfoToolInputSchema } from './getInfoTool.schema.js';

export type GetInfoToolInput = z.infer<typeof getInfoToolInputSchema>;

// Info dictionary fields reported when metadata is requested
const METADATA_FIELDS = [
  'Title',
  'Author',
  'Subject',
  'Keywords',
  'Creator',
  'Producer',
  'CreationDate',
  'ModDate',
] as const;

// --- Output Types ---
export interface GetInfoResult {
  /** The input file path. */
  path: string;
  success: boolean;
  pageCount?: number;
  metadata?: Record<string, string>;
  error?: string;
  suggestion?: string;
}

const GetInfoResultSchema = z.object({
  path: z.string(),
  success: z.boolean(),
  pageCount: z.number().int().nonnegative().optional(),
  metadata: z.record(z.string(), z.string()).optional(),
  error: z.string().optional(),
  suggestion: z.string().optional(),
});

/** Reports the page count, and optionally the Info metadata, of one PDF. */
export async function readPdfInfo(
  args: GetInfoToolInput,
  context: ToolExecuteOptions,
  codec: PdfCodec = mupdfCodec,
): Promise<GetInfoResult> {
  const { file_path: inputPath, include_metadata: includeMetadata } = args;
  const result: GetInfoResult = { path: inputPath, success: false };

  const resolvedPath = validateAndResolvePath(
    inputPath,
    context.workspaceRoot,
    context.allowOutsideWorkspace,
  );
  if (typeof resolvedPath !== 'string') {
    result.error = resolvedPath.error;
    result.suggestion = resolvedPath.suggestion;
    return result;
  }

  try {
    const doc = await openPdfDocument(resolvedPath, codec);
    try {
      result.pageCount = doc.pageCount;
      if (includeMetadata) {
        const metadata: Record<string, string> = {};
        for (const field of METADATA_FIELDS) {
          const value = doc.getMetadata(field);
          if (value) {
            metadata[field] = value;
          }
        }
        if (Object.keys(metadata).length > 0) {
          result.metadata = metadata;
        }
      }
    } finally {
      doc.close();
    }
    result.success = true;
  } catch (e: unknown) {
    result.error = describeError(e);
    result.suggestion =
      e instanceof PdfToolError && e.suggestion
        ? e.suggestion
        : 'Check file path, permissions, and file validity.';
  }
  return result;
}

export const getInfoTool = defineTool({
  name: 'get-pdf-info',
  description:
    'Reports the page count (and optionally the document metadata) of a PDF file, ' +
    'so a valid page range can be chosen before extracting.',
  inputSchema: getInfoToolInputSchema,
  contextSchema: BaseContextSchema,
  execute: async ({
    context,
    args,
  }: { context: ToolExecuteOptions; args: GetInfoToolInput }): Promise<Part[]> => {
    const parsed = getInfoToolInputSchema.safeParse(args);
    if (!parsed.success) {
      const errorMessages = Object.entries(parsed.error.flatten().fieldErrors)
        .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
        .join('; ');
      throw new Error(`Input validation failed: ${errorMessages}`);
    }

    const result = await readPdfInfo(parsed.data, context);
    if (!result.success) {
      console.error(`[get-pdf-info] ${result.error}`);
    }
    return [jsonPart(result, GetInfoResultSchema)];
  },
});
