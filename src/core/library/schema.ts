import { z } from 'zod';

export const PaperSchema = z.object({
  id: z.string().trim().min(1),
  title: z.string().trim().min(1),
  authors: z.array(z.string().trim().min(1)).default([]),
  year: z.number().int().min(1900).max(2099).optional(),
  venue: z.string().trim().min(1).optional(),
  doi: z.string().trim().min(1).optional(),
  abstract: z.string().optional(),
  concepts: z.array(z.string().trim().min(1)).default([]),
  fields: z.array(z.string().trim().min(1)).default([]),
  /** Identifiers of papers this paper cites. */
  cites: z.array(z.string().trim().min(1)).default([]),
  chunks: z.array(z.string().min(1)).default([]),
  fullText: z.string().optional(),
});

export const LibrarySchema = z.object({
  name: z.string().optional(),
  papers: z.array(PaperSchema),
});

export type Paper = z.infer<typeof PaperSchema>;
export type LibraryFile = z.infer<typeof LibrarySchema>;
export type PaperInput = z.input<typeof PaperSchema>;
