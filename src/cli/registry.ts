import type { HandlerRegistration } from './types';
import { defineHandler } from './types';
import { SearchSchema } from './schemas/searchSchemas';
import { SummarizeSchema } from './schemas/summarizeSchemas';
import { ExploreSchema } from './schemas/exploreSchemas';
import { ServeSchema } from './schemas/serveSchemas';
import { handleSearch } from './handlers/searchHandlers';
import { handleSummarize } from './handlers/summarizeHandlers';
import { handleExplore } from './handlers/exploreHandlers';
import { handleServe } from './handlers/serveHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Maps command keys to their schema + handler implementations.
 */
export const cliHandlers: Readonly<Record<string, HandlerRegistration>> = {
  search: defineHandler(SearchSchema, handleSearch),
  summarize: defineHandler(SummarizeSchema, handleSummarize),
  explore: defineHandler(ExploreSchema, handleExplore),
  serve: defineHandler(ServeSchema, handleServe),
};
