import type {
  AbortedOutcome,
  AbortReason,
  CommittedOutcome,
  GradeResultRow,
  ParsedLine,
  ParseFailure,
  ResultRecord,
  SubmissionOutcome,
  SubmissionPolicy,
  TransactionHandle,
} from '@gradebook/core';
import { FinalizeError, PersistenceError, getErrorMessage } from '@gradebook/core';
import { getLogger, type Logger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface GradeBatchCommitterOptions {
  /** Defaults to 'strict' */
  policy?: SubmissionPolicy | undefined;
  /**
   * Report blank lines in `outcome.skipped` instead of treating them as
   * failures. Defaults to true.
   */
  skipBlankLines?: boolean | undefined;
}

interface PartitionedEntries {
  records: ResultRecord[];
  failures: ParseFailure[];
  skipped: ParseFailure[];
}

/**
 * Persists one submission of parsed lines as a single unit of work.
 *
 * Policies decide what a parse failure does: `strict` aborts the whole
 * submission, `best-effort` commits the valid lines and reports the rest.
 * A persistence error aborts the submission under either policy.
 *
 * Exactly one of `commit` / `abort` is called on the handle per submission.
 * If that call fails the result is an `err(FinalizeError)`: the caller can no
 * longer tell whether the rows were applied.
 */
export class GradeBatchCommitter {
  readonly policy: SubmissionPolicy;
  readonly skipBlankLines: boolean;
  private readonly logger: Logger;

  constructor(options: GradeBatchCommitterOptions = {}) {
    this.policy = options.policy ?? 'strict';
    this.skipBlankLines = options.skipBlankLines ?? true;
    this.logger = getLogger('GradeBatchCommitter');
  }

  async insertGrades(
    entries: readonly ParsedLine[],
    handle: TransactionHandle
  ): Promise<Result<SubmissionOutcome, FinalizeError>> {
    const transactionId = handle.id();
    const { records, failures, skipped } = this.partition(entries);
    const summary = { transactionId, policy: this.policy, failures, skipped };

    this.logger.debug(
      { transactionId, records: records.length, failures: failures.length, skipped: skipped.length },
      'Received submission'
    );

    if (this.policy === 'strict' && failures.length > 0) {
      return this.abortSubmission(handle, summary, { kind: 'parse-failures' });
    }

    if (records.length === 0) {
      return this.abortSubmission(handle, summary, { kind: 'empty-submission' });
    }

    const stageResult = this.stage(records, transactionId);
    if (stageResult.isErr()) {
      return this.abortSubmission(handle, summary, { kind: 'persistence', error: stageResult.error });
    }

    const flushResult = await this.flush(handle, stageResult.value);
    if (flushResult.isErr()) {
      return this.abortSubmission(handle, summary, { kind: 'persistence', error: flushResult.error });
    }

    const commitResult = await this.finalize(handle, 'commit');
    if (commitResult.isErr()) {
      return err(commitResult.error);
    }

    this.logger.audit(
      { transactionId, committedCount: flushResult.value, failures: failures.length, policy: this.policy },
      'Submission committed'
    );

    const outcome: CommittedOutcome = { ...summary, state: 'committed', committedCount: flushResult.value };
    return ok(outcome);
  }

  private partition(entries: readonly ParsedLine[]): PartitionedEntries {
    const partitioned: PartitionedEntries = { records: [], failures: [], skipped: [] };

    for (const entry of entries) {
      if (entry.isOk()) {
        partitioned.records.push(entry.value);
      } else if (this.skipBlankLines && entry.error.reason === 'blank') {
        partitioned.skipped.push(entry.error);
      } else {
        partitioned.failures.push(entry.error);
      }
    }

    return partitioned;
  }

  /**
   * Maps records to rows. A record stamped with another transaction id
   * cannot be written under this handle.
   */
  private stage(records: readonly ResultRecord[], transactionId: number): Result<GradeResultRow[], PersistenceError> {
    const rows: GradeResultRow[] = [];

    for (const [index, record] of records.entries()) {
      if (record.transactionId !== transactionId) {
        return err(
          new PersistenceError(
            'stage',
            `Record ${index + 1} belongs to transaction ${record.transactionId}, not ${transactionId}`,
            { transactionId, additionalContext: { studentId: record.studentId } }
          )
        );
      }

      rows.push({
        studentId: record.studentId,
        examEventId: record.examEventId,
        grade: record.grade,
        transactionId,
      });
    }

    this.logger.debug({ transactionId, staged: rows.length }, 'Staged grade results');
    return ok(rows);
  }

  private async flush(handle: TransactionHandle, rows: readonly GradeResultRow[]): Promise<Result<number, PersistenceError>> {
    const transactionId = handle.id();

    let insertResult: Result<number, Error>;
    try {
      insertResult = await handle.insertGradeResults(rows);
    } catch (error) {
      return err(
        new PersistenceError('flush', `Batch insert threw: ${getErrorMessage(error)}`, { transactionId }, { cause: error })
      );
    }

    if (insertResult.isErr()) {
      return err(
        new PersistenceError('flush', insertResult.error.message, { transactionId }, { cause: insertResult.error })
      );
    }

    if (insertResult.value !== rows.length) {
      return err(
        new PersistenceError('flush', `Store accepted ${insertResult.value} of ${rows.length} staged rows`, {
          transactionId,
        })
      );
    }

    return ok(insertResult.value);
  }

  private async abortSubmission(
    handle: TransactionHandle,
    summary: Pick<SubmissionOutcome, 'failures' | 'policy' | 'skipped' | 'transactionId'>,
    reason: AbortReason
  ): Promise<Result<SubmissionOutcome, FinalizeError>> {
    const cause = reason.kind === 'persistence' ? reason.error : undefined;

    const abortResult = await this.finalize(handle, 'abort', cause);
    if (abortResult.isErr()) {
      return err(abortResult.error);
    }

    this.logger.warn(
      {
        transactionId: summary.transactionId,
        reason: reason.kind,
        failures: summary.failures.length,
        ...(cause ? { error: cause } : {}),
      },
      'Submission aborted'
    );

    const outcome: AbortedOutcome = { ...summary, state: 'aborted', committedCount: 0, reason };
    return ok(outcome);
  }

  private async finalize(
    handle: TransactionHandle,
    operation: 'commit' | 'abort',
    cause?: PersistenceError
  ): Promise<Result<void, FinalizeError>> {
    const transactionId = handle.id();

    let result: Result<void, Error>;
    try {
      result = operation === 'commit' ? await handle.commit() : await handle.abort();
    } catch (error) {
      result = err(new Error(getErrorMessage(error), { cause: error }));
    }

    if (result.isOk()) {
      return ok();
    }

    const finalizeError = new FinalizeError(
      operation,
      `Failed to ${operation} transaction ${transactionId}: ${result.error.message}`,
      { transactionId },
      { cause: cause ?? result.error }
    );
    this.logger.error({ error: finalizeError, cause }, 'Transaction end state is unknown');
    return err(finalizeError);
  }
}
