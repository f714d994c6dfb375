import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { closeDatabase, type KyselyDB } from './database.js';
import { initializeDatabase } from './initialization.js';
import { ExamEventRepository } from './repositories/exam-event-repository.js';
import { GradeResultRepository } from './repositories/grade-result-repository.js';
import { TransactionRecordRepository } from './repositories/transaction-record-repository.js';
import { KyselyTransactionHandle, type BeginSubmissionParams } from './transaction/kysely-transaction-handle.js';

/**
 * Repositories plus submission transactions over one database connection.
 */
export class GradebookDataContext {
  static async initialize(dbPath: string): Promise<Result<GradebookDataContext, Error>> {
    const initResult = await initializeDatabase(dbPath);
    if (initResult.isErr()) return err(initResult.error);
    return ok(new GradebookDataContext(initResult.value));
  }

  readonly examEvents: ExamEventRepository;
  readonly transactionRecords: TransactionRecordRepository;
  readonly gradeResults: GradeResultRepository;

  constructor(private readonly connection: KyselyDB) {
    this.examEvents = new ExamEventRepository(connection);
    this.transactionRecords = new TransactionRecordRepository(connection);
    this.gradeResults = new GradeResultRepository(connection);
  }

  /**
   * Opens the transaction for one submission. Until the returned handle is
   * committed or aborted it holds the connection; other queries on this
   * context wait for it.
   */
  async beginSubmission(params: BeginSubmissionParams): Promise<Result<KyselyTransactionHandle, Error>> {
    return KyselyTransactionHandle.begin(this.connection, params);
  }

  async close(): Promise<Result<void, Error>> {
    return closeDatabase(this.connection);
  }
}
