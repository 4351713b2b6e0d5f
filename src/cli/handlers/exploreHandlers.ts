import { createLogger } from '../../core/log';
import type { ExploreInput } from '../schemas/exploreSchemas';
import type { CLIResult, CLIError } from '../types';
import { error, ErrorReasons, success } from '../types';
import { isCLIError, resolveOrchestrator } from '../helpers';

export async function handleExplore(input: ExploreInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'explore' });
  const orchestrator = await resolveOrchestrator(input);
  if (isCLIError(orchestrator)) return orchestrator;

  const result = await orchestrator.explore(input.text, {
    paperId: input.paper,
    author: input.author,
    concept: input.concept,
    field: input.field,
    startYear: input.startYear,
    endYear: input.endYear,
    forceMode: input.mode,
    limit: input.limit,
    maxHops: input.maxHops,
  });
  if (!result.success) {
    const { success: _ok, error: message, suggestion, ...rest } = result;
    return error(ErrorReasons.EXPLORE_FAILED, { ...rest, message, ...(suggestion ? { hint: suggestion } : {}) });
  }
  log.info('explore', { ok: true, mode: result.mode, items: result.itemsFound });
  const { success: _ok, ...rest } = result;
  return success({ ...rest });
}
