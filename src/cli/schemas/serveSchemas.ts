import { z } from 'zod';
import { LibraryOptionsSchema } from './commonSchemas';

export const ServeSchema = LibraryOptionsSchema.extend({
  disableMcpLog: z.boolean().default(false),
});

export type ServeInput = z.infer<typeof ServeSchema>;
