import { z } from 'zod';
import { GRAPH_STRATEGIES } from '../../core/retrieval/types';
import { LibraryOptionsSchema, yearOption } from './commonSchemas';

export const ExploreSchema = LibraryOptionsSchema.extend({
  text: z.string().trim().default(''),
  mode: z.enum(GRAPH_STRATEGIES).optional(),
  paper: z.string().min(1).optional(),
  author: z.string().min(1).optional(),
  concept: z.string().min(1).optional(),
  field: z.string().min(1).optional(),
  startYear: yearOption.optional(),
  endYear: yearOption.optional(),
  limit: z.coerce.number().int().positive().max(100).default(10),
  maxHops: z.coerce.number().int().min(1).max(5).optional(),
});

export type ExploreInput = z.infer<typeof ExploreSchema>;
