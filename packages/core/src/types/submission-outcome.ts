import type { PersistenceError } from '../errors/index.js';

import type { ParseFailure } from './result-record.js';

/**
 * - `strict`: any parse failure aborts the whole submission
 * - `best-effort`: valid lines are committed, failures are reported alongside
 */
export type SubmissionPolicy = 'strict' | 'best-effort';

export type AbortReason =
  | { kind: 'parse-failures' }
  | { kind: 'empty-submission' }
  | { error: PersistenceError; kind: 'persistence' };

interface OutcomeBase {
  transactionId: number;
  policy: SubmissionPolicy;
  /** Failures that counted against the policy, in input order. */
  failures: readonly ParseFailure[];
  /** Blank lines left out of the submission, in input order. */
  skipped: readonly ParseFailure[];
}

export interface CommittedOutcome extends OutcomeBase {
  state: 'committed';
  committedCount: number;
}

export interface AbortedOutcome extends OutcomeBase {
  state: 'aborted';
  committedCount: 0;
  reason: AbortReason;
}

export type SubmissionOutcome = CommittedOutcome | AbortedOutcome;
