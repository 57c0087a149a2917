import { z } from 'zod';

// Range rules (>= 1, end >= start) are checked by validateExtractionRequest so that
// violations come back as tool output rather than protocol errors.
export const extractPagesToolInputSchema = z.object({
  file_path: z.string().describe('Path to the PDF file, absolute or relative to the workspace root.'),
  start_page: z.number().int().optional().describe('First page to extract (1-indexed). Defaults to 1.'),
  end_page: z
    .number()
    .int()
    .optional()
    .describe('Last page to extract, inclusive (1-indexed). Defaults to 1.'),
  save_output: z
    .boolean()
    .optional()
    .describe('Also save the extracted pages as a new PDF next to the source file. Defaults to false.'),
  save_pdf: z.boolean().optional().describe('Deprecated alias of save_output.'),
});
