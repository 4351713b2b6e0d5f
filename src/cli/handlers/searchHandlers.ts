import { createLogger } from '../../core/log';
import type { QueryParams } from '../../core/retrieval/types';
import type { SearchInput } from '../schemas/searchSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';
import { isCLIError, resolveOrchestrator } from '../helpers';

export function searchParams(input: Pick<SearchInput, 'author' | 'paper' | 'startYear' | 'endYear'>): QueryParams {
  const params: QueryParams = {};
  if (input.author) params.author = input.author;
  if (input.paper) params.paperId = input.paper;
  if (input.startYear !== undefined || input.endYear !== undefined) {
    params.yearRange = { start: input.startYear, end: input.endYear };
  }
  return params;
}

export async function handleSearch(input: SearchInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'search' });
  const orchestrator = await resolveOrchestrator(input);
  if (isCLIError(orchestrator)) return orchestrator;

  const response = await orchestrator.search(input.text, {
    limit: input.limit,
    forceMode: input.mode,
    params: searchParams(input),
    timeoutMs: input.timeout,
  });
  log.info('search', {
    ok: true,
    mode: response.mode,
    backends: response.backendsUsed,
    results: response.results.length,
    escalated: response.escalated,
  });
  return success({ ...response });
}
