/** Error taxonomy shared by the orchestrator, backends and surfaces. */

export enum ErrorCode {
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
  BACKEND_EMPTY = 'BACKEND_EMPTY',
  BACKEND_TIMEOUT = 'BACKEND_TIMEOUT',
  MALFORMED_PARAMETER = 'MALFORMED_PARAMETER',
  INVALID_CONFIG = 'INVALID_CONFIG',
  LIBRARY_INVALID = 'LIBRARY_INVALID',
  LIBRARY_NOT_FOUND = 'LIBRARY_NOT_FOUND',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorOptions {
  context?: Record<string, unknown>;
  suggestions?: string[];
  cause?: unknown;
}

export class ScholarError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;
  readonly suggestions: string[];

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message);
    this.name = 'ScholarError';
    this.code = code || ErrorCode.UNKNOWN_ERROR;
    this.context = options?.context;
    this.suggestions = options?.suggestions || [];
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      suggestions: this.suggestions,
    };
  }
}

/** A backend could not be reached or refused the call. */
export class BackendUnavailableError extends ScholarError {
  constructor(backend: string, reason: string, cause?: unknown) {
    super(`Backend "${backend}" is unavailable: ${reason}`, ErrorCode.BACKEND_UNAVAILABLE, {
      context: { backend },
      suggestions: ['Check that the backend service is running', 'Retry with --mode fast to use the vector backend only'],
      cause,
    });
    this.name = 'BackendUnavailableError';
  }
}

/** A backend answered but holds no data for the request. */
export class BackendEmptyError extends ScholarError {
  constructor(backend: string) {
    super(`Backend "${backend}" returned no data`, ErrorCode.BACKEND_EMPTY, { context: { backend } });
    this.name = 'BackendEmptyError';
  }
}

export class BackendTimeoutError extends ScholarError {
  constructor(backend: string, timeoutMs: number) {
    super(`Backend "${backend}" did not answer before the deadline`, ErrorCode.BACKEND_TIMEOUT, {
      context: { backend, timeoutMs },
    });
    this.name = 'BackendTimeoutError';
  }
}

/** An extracted or caller-supplied parameter failed validation and was dropped. */
export class MalformedParameterError extends ScholarError {
  constructor(field: string, value: unknown, reason: string) {
    super(`Parameter "${field}" is malformed: ${reason}`, ErrorCode.MALFORMED_PARAMETER, {
      context: { field, value },
    });
    this.name = 'MalformedParameterError';
  }
}

export class ConfigError extends ScholarError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.INVALID_CONFIG, options);
    this.name = 'ConfigError';
  }
}

export class LibraryError extends ScholarError {
  constructor(message: string, code: ErrorCode.LIBRARY_INVALID | ErrorCode.LIBRARY_NOT_FOUND, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'LibraryError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
