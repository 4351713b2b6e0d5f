import type { BackendAdapters } from './backends/types';
import { mergeOrchestratorConfig, type OrchestratorConfig } from './config';
import { ErrorCode, LibraryError } from './errors';
import { runExplore, type ExploreOptions, type ExploreResult } from './explore';
import { openLibrary } from './library';
import { runSearch, type SearchOptions, type SearchResponse } from './search';
import { runSummarize, type SummarizeOptions, type SummarizeResult } from './summarize';

/**
 * Entry point for research queries: one set of backend adapters and one frozen
 * config, shared by search, summarize and explore.
 */
export class ResearchOrchestrator {
  readonly config: Readonly<OrchestratorConfig>;

  constructor(
    readonly adapters: BackendAdapters,
    config: Readonly<OrchestratorConfig> = mergeOrchestratorConfig()
  ) {
    this.config = config;
  }

  /** Serves every backend from a local library file. */
  static async fromLibrary(file: string, config: Readonly<OrchestratorConfig> = mergeOrchestratorConfig()): Promise<ResearchOrchestrator> {
    return new ResearchOrchestrator(await openLibrary(file), config);
  }

  /** Uses `config.library`; fails when no library is configured. */
  static async fromConfig(config: Readonly<OrchestratorConfig>): Promise<ResearchOrchestrator> {
    if (!config.library) {
      throw new LibraryError('No library configured', ErrorCode.LIBRARY_NOT_FOUND, {
        suggestions: ['Pass --library <file>', 'Set "library" in scholarmux.config.json', 'Set SCHOLARMUX_LIBRARY'],
      });
    }
    return ResearchOrchestrator.fromLibrary(config.library, config);
  }

  search(text: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return runSearch({ adapters: this.adapters, config: this.config }, text, options);
  }

  summarize(itemId: string, options: SummarizeOptions = {}): Promise<SummarizeResult> {
    return runSummarize(this.adapters.documents, itemId, options);
  }

  explore(text: string, options: ExploreOptions = {}): Promise<ExploreResult> {
    return runExplore(this.adapters, text, options);
  }
}
