import { ScholarMcpServer } from '../../mcp/server';
import { createLogger } from '../../core/log';
import type { ServeInput } from '../schemas/serveSchemas';
import type { CLIResult, CLIError } from '../types';
import { isCLIError, resolveOrchestrator } from '../helpers';

/** Resolves only on a startup failure; a running server keeps the process alive. */
export async function handleServe(input: ServeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'serve' });
  const orchestrator = await resolveOrchestrator(input);
  if (isCLIError(orchestrator)) return orchestrator;

  log.info('serve_start', { disableAccessLog: input.disableMcpLog, transport: 'stdio' });
  const server = new ScholarMcpServer(orchestrator, { disableAccessLog: input.disableMcpLog });
  await server.start();
  return new Promise<never>(() => undefined);
}
