import { z } from 'zod';

export const getInfoToolInputSchema = z.object({
  file_path: z.string().min(1, 'file_path cannot be empty.'),
  include_metadata: z.boolean().optional(),
});
