import { FinalizeError, NotFoundError, ValidationError } from '@gradebook/core';
import type { Result } from 'neverthrow';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Convert Result to value or throw error.
 */
export function unwrapResult<T>(result: Result<T, Error>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Exit code for an error that reached a command. Anything that is not a
 * domain error came from the database layer.
 */
export function errorToExitCode(error: Error): ExitCode {
  if (error instanceof FinalizeError) return ExitCodes.UNCERTAIN_STATE;
  if (error instanceof NotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof ValidationError) return ExitCodes.INVALID_ARGS;
  return ExitCodes.DATABASE_ERROR;
}
