import type { ToolDefinition } from '../types';
import type { ExploreArgs, SearchArgs, SummarizeArgs } from '../schemas/researchSchemas';
import { handleExplore, handleSearch, handleSummarize } from '../handlers/researchHandlers';
import { GRAPH_STRATEGIES, INTENTS } from '../../core/retrieval/types';
import { SUMMARY_DEPTHS } from '../../core/summarize/classifier';

export const searchDefinition: ToolDefinition<SearchArgs> = {
  name: 'search',
  description: 'Search the research library. The query is classified, routed to vector, graph and metadata backends, and the ranked lists are fused with a quality signal. Risk: low (read-only).',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string' },
      limit: { type: 'number', default: 10 },
      mode: { type: 'string', enum: ['fast', ...INTENTS], description: 'Force a route instead of classifying the query' },
      author: { type: 'string' },
      paper_id: { type: 'string' },
      start_year: { type: 'number' },
      end_year: { type: 'number' },
      timeout_ms: { type: 'number', description: 'Overall deadline; slow backends are reported as timed out' },
    },
    required: ['query'],
  },
  handler: handleSearch,
};

export const summarizeDefinition: ToolDefinition<SummarizeArgs> = {
  name: 'summarize',
  description: 'Summarize one paper. Depth (quick, targeted, comprehensive, full) is picked from the question unless forced. Risk: low (read-only).',
  inputSchema: {
    type: 'object',
    properties: {
      item_id: { type: 'string' },
      query: { type: 'string', description: 'Question about the paper' },
      depth: { type: 'string', enum: [...SUMMARY_DEPTHS] },
    },
    required: ['item_id'],
  },
  handler: handleSummarize,
};

export const exploreDefinition: ToolDefinition<ExploreArgs> = {
  name: 'explore',
  description: 'Explore citation chains, influential papers, collaborator and concept networks, topic evolution and venues. Risk: low (read-only).',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', default: '' },
      mode: { type: 'string', enum: [...GRAPH_STRATEGIES] },
      paper_id: { type: 'string' },
      author: { type: 'string' },
      concept: { type: 'string' },
      field: { type: 'string' },
      start_year: { type: 'number' },
      end_year: { type: 'number' },
      limit: { type: 'number', default: 10 },
      max_hops: { type: 'number' },
    },
  },
  handler: handleExplore,
};
