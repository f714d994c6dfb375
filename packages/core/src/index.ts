export * from './errors/index.js';
export * from './schemas/result-record.js';
export type { GradeResultRow, ParsedLine, ParseFailure, ParseFailureReason } from './types/result-record.js';
export type { TransactionHandle } from './types/transaction-handle.js';
export type {
  AbortedOutcome,
  AbortReason,
  CommittedOutcome,
  SubmissionOutcome,
  SubmissionPolicy,
} from './types/submission-outcome.js';
export { getErrorMessage, isErrorWithMessage, wrapError } from './utils/type-guard-utils.js';
