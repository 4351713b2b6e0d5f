import { z } from 'zod';
import { SUMMARY_DEPTHS } from '../../core/summarize/classifier';
import { LibraryOptionsSchema } from './commonSchemas';

export const SummarizeSchema = LibraryOptionsSchema.extend({
  itemId: z.string().trim().min(1, 'Item id is required'),
  query: z.string().trim().min(1).optional(),
  depth: z.enum(SUMMARY_DEPTHS).optional(),
});

export type SummarizeInput = z.infer<typeof SummarizeSchema>;
