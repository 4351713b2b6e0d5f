import { createLogger } from '../../core/log';
import type { SummarizeInput } from '../schemas/summarizeSchemas';
import type { CLIResult, CLIError } from '../types';
import { error, ErrorReasons, success } from '../types';
import { isCLIError, resolveOrchestrator } from '../helpers';

export async function handleSummarize(input: SummarizeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'summarize' });
  const orchestrator = await resolveOrchestrator(input);
  if (isCLIError(orchestrator)) return orchestrator;

  const result = await orchestrator.summarize(input.itemId, { query: input.query, forceDepth: input.depth });
  if (!result.success) {
    const { success: _ok, error: message, suggestion, ...rest } = result;
    return error(ErrorReasons.SUMMARIZE_FAILED, { ...rest, message, ...(suggestion ? { hint: suggestion } : {}) });
  }
  log.info('summarize', { ok: true, depth: result.depth, tokens: result.tokensEstimated });
  const { success: _ok, ...rest } = result;
  return success({ ...rest });
}
