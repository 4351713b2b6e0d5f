import { z } from 'zod';
import { INTENTS } from '../../core/retrieval/types';
import { LibraryOptionsSchema, yearOption } from './commonSchemas';

export const SearchModeSchema = z.union([z.literal('fast'), z.enum(INTENTS)]);

export const SearchSchema = LibraryOptionsSchema.extend({
  text: z.string().trim().min(1, 'Query text is required'),
  limit: z.coerce.number().int().positive().max(100).optional(),
  mode: SearchModeSchema.optional(),
  timeout: z.coerce.number().int().positive().optional(),
  author: z.string().min(1).optional(),
  paper: z.string().min(1).optional(),
  startYear: yearOption.optional(),
  endYear: yearOption.optional(),
});

export type SearchInput = z.infer<typeof SearchSchema>;
