export { ResearchOrchestrator } from './core/orchestrator';
export { runSearch, type SearchContext, type SearchOptions, type SearchResponse, type SearchHit, type SearchMode } from './core/search';
export { runSummarize, classifyDepth, type SummarizeOptions, type SummarizeResult, type SummaryDepth } from './core/summarize';
export { runExplore, classifyExploration, type ExploreOptions, type ExploreResult } from './core/explore';
export {
  defaultOrchestratorConfig,
  mergeOrchestratorConfig,
  loadConfigFile,
  resolveConfig,
  type OrchestratorConfig,
  type ConfigOverrides,
} from './core/config';
export * from './core/errors';
export * from './core/backends/types';
export * from './core/retrieval';
export { LibraryCorpus, libraryAdapters, openLibrary, type Paper, type PaperInput } from './core/library';
export { createLogger, type Logger } from './core/log';
export { ScholarMcpServer } from './mcp/server';
