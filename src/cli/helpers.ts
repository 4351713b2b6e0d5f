import { resolveConfig } from '../core/config';
import { ConfigError, ErrorCode, LibraryError } from '../core/errors';
import { ResearchOrchestrator } from '../core/orchestrator';
import type { CLIError } from './types';
import { error, ErrorHints, ErrorReasons } from './types';

/** Options shared by every command that reads the library. */
export interface CommonOptions {
  library?: string;
  config?: string;
}

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

/**
 * Resolve the config file and open the library it names
 *
 * @returns An orchestrator over the library, or an agent-readable error
 */
export async function resolveOrchestrator(options: CommonOptions, cwd: string = process.cwd()): Promise<ResearchOrchestrator | CLIError> {
  try {
    const config = await resolveConfig({ configPath: options.config, library: options.library, cwd });
    return await ResearchOrchestrator.fromConfig(config);
  } catch (e) {
    return formatError(e);
  }
}

/** Maps configuration and library failures to their CLI reasons. */
export function formatError(e: unknown): CLIError {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof ConfigError) {
    return error(ErrorReasons.CONFIG_INVALID, { message, ...e.context, hint: ErrorHints.CONFIG_INVALID });
  }
  if (e instanceof LibraryError) {
    const notFound = e.code === ErrorCode.LIBRARY_NOT_FOUND;
    return error(notFound ? ErrorReasons.LIBRARY_NOT_FOUND : ErrorReasons.LIBRARY_INVALID, {
      message,
      ...e.context,
      hint: notFound ? ErrorHints.LIBRARY_NOT_FOUND : ErrorHints.LIBRARY_INVALID,
    });
  }
  return error(ErrorReasons.INTERNAL_ERROR, { message });
}
