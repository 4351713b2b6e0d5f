import type { ToolHandler } from '../types';
import { errorResponse, successResponse } from '../types';
import type { ExploreArgs, SearchArgs, SummarizeArgs } from '../schemas/researchSchemas';
import type { QueryParams } from '../../core/retrieval/types';

function searchParams(args: SearchArgs): QueryParams {
  const params: QueryParams = {};
  if (args.author) params.author = args.author;
  if (args.paper_id) params.paperId = args.paper_id;
  if (args.start_year !== undefined || args.end_year !== undefined) {
    params.yearRange = { start: args.start_year, end: args.end_year };
  }
  return params;
}

export const handleSearch: ToolHandler<SearchArgs> = async (args, context) => {
  const response = await context.orchestrator.search(args.query, {
    limit: args.limit,
    forceMode: args.mode,
    params: searchParams(args),
    timeoutMs: args.timeout_ms,
  });
  return successResponse({ ...response });
};

export const handleSummarize: ToolHandler<SummarizeArgs> = async (args, context) => {
  const result = await context.orchestrator.summarize(args.item_id, { query: args.query, forceDepth: args.depth });
  if (!result.success) {
    const { success: _ok, error, ...details } = result;
    return errorResponse(new Error(error), 'SUMMARIZE_FAILED', details);
  }
  const { success: _ok, ...data } = result;
  return successResponse({ ...data });
};

export const handleExplore: ToolHandler<ExploreArgs> = async (args, context) => {
  const result = await context.orchestrator.explore(args.query, {
    paperId: args.paper_id,
    author: args.author,
    concept: args.concept,
    field: args.field,
    startYear: args.start_year,
    endYear: args.end_year,
    forceMode: args.mode,
    limit: args.limit,
    maxHops: args.max_hops,
  });
  if (!result.success) {
    const { success: _ok, error, ...details } = result;
    return errorResponse(new Error(error), 'EXPLORE_FAILED', details);
  }
  const { success: _ok, ...data } = result;
  return successResponse({ ...data });
};
