import { z } from 'zod';

export const LibraryOptionsSchema = z.object({
  library: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
});

export const yearOption = z.coerce.number().int();
