import { z } from 'zod';
import { createLogger } from '../core/log';
import { ScholarError } from '../core/errors';

/**
 * Standard CLI result interface for successful operations
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - remaining keys: command-specific result data
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput = unknown> = (input: TInput) => Promise<CLIResult | CLIError>;

/** A schema and its handler, with the input type erased once the pair is checked. */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

export interface Dispatched {
  exitCode: 0 | 1 | 2;
  payload: CLIResult | CLIError;
}

/**
 * Validates and runs one registered handler, returning the agent-readable
 * payload and the exit code the process should end with.
 */
export async function dispatchHandler(
  handlers: Readonly<Record<string, HandlerRegistration>>,
  commandKey: string,
  rawInput: unknown
): Promise<Dispatched> {
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const handler = handlers[commandKey];
  if (!handler) {
    return {
      exitCode: 1,
      payload: {
        ok: false,
        reason: ErrorReasons.UNKNOWN_COMMAND,
        command: commandKey,
        timestamp,
        hint: 'Run "scholarmux --help" to see available commands',
      },
    };
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const payload = { ...result, command: commandKey, timestamp, duration_ms: Date.now() - startedAt };
    return { exitCode: result.ok ? 0 : 2, payload };
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));
      return {
        exitCode: 1,
        payload: {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
      };
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };
    log.error(commandKey, { ok: false, err: errorDetails });

    return {
      exitCode: 1,
      payload: {
        ok: false,
        reason: ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        ...(e instanceof ScholarError ? { code: e.code } : {}),
        hint: 'An unexpected error occurred. Check logs for details.',
      },
    };
  }
}

/**
 * Execute a CLI handler with validation and error handling
 *
 * @example
 * ```typescript
 * .action(async (text, options) => {
 *   await executeHandler('search', { text, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry.js');
  const { exitCode, payload } = await dispatchHandler(cliHandlers, commandKey, rawInput);
  const text = JSON.stringify(payload, null, 2);
  if (exitCode === 0) console.log(text);
  else process.stderr.write(text + '\n');
  process.exit(exitCode);
}

export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  UNKNOWN_COMMAND: 'unknown_command',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  CONFIG_INVALID: 'config_invalid',
  LIBRARY_NOT_FOUND: 'library_not_found',
  LIBRARY_INVALID: 'library_invalid',
  NO_RESULTS: 'no_results',
  SUMMARIZE_FAILED: 'summarize_failed',
  EXPLORE_FAILED: 'explore_failed',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  CONFIG_INVALID: 'Compare your config with scholarmux.config.example.json',
  LIBRARY_NOT_FOUND: 'Pass --library <file>, set "library" in scholarmux.config.json or set SCHOLARMUX_LIBRARY',
  LIBRARY_INVALID: 'Check the library file against the documented paper schema',
} as const;
