import type { SubmissionOutcome, SubmissionPolicy, TransactionHandle } from '@gradebook/core';
import { FinalizeError, IdSchema, NotFoundError, ValidationError, getErrorMessage } from '@gradebook/core';
import type { ExamEvent } from '@gradebook/data';
import { getLogger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { GradeBatchCommitter } from '../commit/grade-batch-committer.js';
import { ResultLineParser } from '../parsing/result-line-parser.js';

/**
 * The slice of the data layer an import needs. GradebookDataContext
 * satisfies it.
 */
export interface GradeImportStore {
  examEvents: {
    findById(examEventId: number): Promise<Result<ExamEvent | undefined, Error>>;
  };
  beginSubmission(params: { transactionDate?: Date | undefined; userId: number }): Promise<Result<TransactionHandle, Error>>;
}

export interface ImportLinesParams {
  lines: readonly string[];
  examEventId: number;
  userId: number;
  policy?: SubmissionPolicy | undefined;
  skipBlankLines?: boolean | undefined;
  transactionDate?: Date | undefined;
}

/**
 * Runs one submission end to end: checks the exam event, opens a
 * transaction, parses every line against it and hands the result to the
 * committer.
 */
export class GradeImportService {
  private readonly logger = getLogger('GradeImportService');

  constructor(private readonly store: GradeImportStore) {}

  async importLines(params: ImportLinesParams): Promise<Result<SubmissionOutcome, Error>> {
    const { examEventId, lines, userId } = params;

    if (!IdSchema.safeParse(examEventId).success) {
      return err(new ValidationError(`Invalid exam event id: ${examEventId}`));
    }
    if (!IdSchema.safeParse(userId).success) {
      return err(new ValidationError(`Invalid user id: ${userId}`));
    }

    const eventResult = await this.store.examEvents.findById(examEventId);
    if (eventResult.isErr()) {
      return err(eventResult.error);
    }
    if (!eventResult.value) {
      return err(new NotFoundError(`Exam event ${examEventId} not found`));
    }

    const handleResult = await this.store.beginSubmission({ userId, transactionDate: params.transactionDate });
    if (handleResult.isErr()) {
      return err(handleResult.error);
    }
    const handle = handleResult.value;

    this.logger.info(
      { examEventId, transactionId: handle.id(), lines: lines.length, policy: params.policy ?? 'strict' },
      `Importing results for "${eventResult.value.name}"`
    );

    const parserResult = ResultLineParser.create({ examEventId, transactionId: handle.id() });
    if (parserResult.isErr()) {
      return this.abortAfterSetupFailure(handle, parserResult.error);
    }

    const committer = new GradeBatchCommitter({ policy: params.policy, skipBlankLines: params.skipBlankLines });
    return committer.insertGrades(parserResult.value.parseLines(lines), handle);
  }

  private async abortAfterSetupFailure(
    handle: TransactionHandle,
    setupError: Error
  ): Promise<Result<SubmissionOutcome, Error>> {
    const transactionId = handle.id();

    let abortResult: Result<void, Error>;
    try {
      abortResult = await handle.abort();
    } catch (error) {
      abortResult = err(new Error(getErrorMessage(error), { cause: error }));
    }

    if (abortResult.isOk()) {
      return err(setupError);
    }

    const finalizeError = new FinalizeError(
      'abort',
      `Failed to abort transaction ${transactionId}: ${abortResult.error.message}`,
      { transactionId },
      { cause: setupError }
    );
    this.logger.error({ error: finalizeError }, 'Transaction end state is unknown');
    return err(finalizeError);
  }
}
