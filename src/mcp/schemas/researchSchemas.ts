import { z } from 'zod';
import { GRAPH_STRATEGIES, INTENTS } from '../../core/retrieval/types';
import { SUMMARY_DEPTHS } from '../../core/summarize/classifier';

const year = z.number().int();

/**
 * Schema for search tool
 */
export const SearchArgsSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  limit: z.number().int().positive().max(100).optional(),
  mode: z.union([z.literal('fast'), z.enum(INTENTS)]).optional(),
  author: z.string().min(1).optional(),
  paper_id: z.string().min(1).optional(),
  start_year: year.optional(),
  end_year: year.optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export type SearchArgs = z.infer<typeof SearchArgsSchema>;

/**
 * Schema for summarize tool
 */
export const SummarizeArgsSchema = z.object({
  item_id: z.string().trim().min(1, 'item_id is required'),
  query: z.string().trim().min(1).optional(),
  depth: z.enum(SUMMARY_DEPTHS).optional(),
});

export type SummarizeArgs = z.infer<typeof SummarizeArgsSchema>;

/**
 * Schema for explore tool
 */
export const ExploreArgsSchema = z.object({
  query: z.string().trim().default(''),
  mode: z.enum(GRAPH_STRATEGIES).optional(),
  paper_id: z.string().min(1).optional(),
  author: z.string().min(1).optional(),
  concept: z.string().min(1).optional(),
  field: z.string().min(1).optional(),
  start_year: year.optional(),
  end_year: year.optional(),
  limit: z.number().int().positive().max(100).default(10),
  max_hops: z.number().int().min(1).max(5).optional(),
});

export type ExploreArgs = z.infer<typeof ExploreArgsSchema>;
