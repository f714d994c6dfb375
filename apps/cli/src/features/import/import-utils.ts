// Pure helpers for the import command

import type { ParseFailure, ParseFailureReason, SubmissionOutcome } from '@gradebook/core';
import type { z } from 'zod';

import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';
import type { ImportCommandOptionsSchema } from '../shared/schemas.js';

import type { ImportHandlerParams } from './import-handler.js';

/**
 * CLI options validated by Zod at CLI boundary
 */
export type ImportCommandOptions = z.infer<typeof ImportCommandOptionsSchema>;

const REASON_LABELS: Record<ParseFailureReason, string> = {
  blank: 'blank line',
  'grade-missing': 'no valid grade in the last column',
  malformed: 'grade is not the last column',
  'neither-found': 'no student id and no grade',
  'student-id-missing': 'no 7-digit student id',
};

export function buildImportHandlerParams(filePath: string, options: ImportCommandOptions): ImportHandlerParams {
  return {
    filePath,
    examEventId: options.event,
    userId: options.user,
    policy: options.policy,
    skipBlankLines: !options.keepBlankLines,
  };
}

export function formatFailure(failure: ParseFailure): string {
  return `line ${failure.lineNumber}: ${REASON_LABELS[failure.reason]} (${JSON.stringify(failure.line)})`;
}

/**
 * One line describing why a submission was rolled back.
 */
export function describeAbort(outcome: SubmissionOutcome): string | undefined {
  if (outcome.state === 'committed') return undefined;

  switch (outcome.reason.kind) {
    case 'parse-failures':
      return `${outcome.failures.length} line(s) could not be parsed; nothing was imported (strict policy)`;
    case 'empty-submission':
      return 'The file contains no result lines; nothing was imported';
    case 'persistence':
      return `The database rejected the submission: ${outcome.reason.error.message}`;
  }
}

export function outcomeExitCode(outcome: SubmissionOutcome): ExitCode {
  return outcome.state === 'committed' ? ExitCodes.SUCCESS : ExitCodes.VALIDATION_ERROR;
}

/**
 * Shape of `data` in the JSON envelope.
 */
export function toImportCommandResult(outcome: SubmissionOutcome) {
  return {
    state: outcome.state,
    transactionId: outcome.transactionId,
    policy: outcome.policy,
    committedCount: outcome.committedCount,
    reason: outcome.state === 'aborted' ? outcome.reason.kind : undefined,
    failures: outcome.failures,
    skipped: outcome.skipped.length,
  };
}
