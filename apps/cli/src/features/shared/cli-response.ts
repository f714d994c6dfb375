import type { ExitCode } from './exit-codes.js';

/**
 * Envelope printed by every command in `--json` mode.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;

  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Only present on success */
  data?: T;

  /** Only present on failure */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        details?: unknown;

        message: string;

        /** Only in development */
        stack?: string | undefined;
      }
    | undefined;

  /** Execution metadata such as `duration_ms` */
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: { code: string; details?: unknown; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
    7: 'DATABASE_ERROR',
    8: 'VALIDATION_ERROR',
    12: 'UNCERTAIN_STATE',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}
