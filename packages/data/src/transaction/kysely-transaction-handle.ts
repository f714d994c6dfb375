import type { GradeResultRow, TransactionHandle } from '@gradebook/core';
import { IdSchema, wrapError } from '@gradebook/core';
import { getLogger } from '@gradebook/logger';
import type { ControlledTransaction } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { DatabaseSchema } from '../schema/database-schema.js';

const logger = getLogger('KyselyTransactionHandle');

// 4 bound parameters per row stays far below SQLite's host parameter limit
const INSERT_CHUNK_SIZE = 500;

export interface BeginSubmissionParams {
  userId: number;
  /** Defaults to today */
  transactionDate?: Date | undefined;
}

type HandleState = 'open' | 'committed' | 'aborted' | 'failed';

/**
 * TransactionHandle backed by a Kysely ControlledTransaction on SQLite.
 *
 * The transactions row is inserted inside the same transaction, so an aborted
 * submission leaves no transaction record behind.
 */
export class KyselyTransactionHandle implements TransactionHandle {
  static async begin(db: KyselyDB, params: BeginSubmissionParams): Promise<Result<KyselyTransactionHandle, Error>> {
    if (!IdSchema.safeParse(params.userId).success) {
      return err(new Error(`Invalid user id: ${params.userId}`));
    }

    let trx: ControlledTransaction<DatabaseSchema> | undefined;

    try {
      trx = await db.startTransaction().execute();

      const row = await trx
        .insertInto('transactions')
        .values({
          user_id: params.userId,
          transaction_date: (params.transactionDate ?? new Date()).toISOString().slice(0, 10),
        })
        .returning('id')
        .executeTakeFirstOrThrow();

      logger.debug({ transactionId: row.id, userId: params.userId }, 'Opened submission transaction');
      return ok(new KyselyTransactionHandle(trx, row.id));
    } catch (error) {
      if (trx) {
        try {
          await trx.rollback().execute();
        } catch (rollbackError) {
          logger.error({ rollbackError }, 'Failed to roll back after begin failure');
        }
      }
      return wrapError(error, 'Failed to begin submission transaction');
    }
  }

  private state: HandleState = 'open';

  private constructor(
    private readonly trx: ControlledTransaction<DatabaseSchema>,
    private readonly transactionId: number
  ) {}

  id(): number {
    return this.transactionId;
  }

  get status(): HandleState {
    return this.state;
  }

  async insertGradeResults(rows: readonly GradeResultRow[]): Promise<Result<number, Error>> {
    const openCheck = this.ensureOpen('insert grade results');
    if (openCheck.isErr()) return err(openCheck.error);

    try {
      let inserted = 0;
      for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
        const chunk = rows.slice(start, start + INSERT_CHUNK_SIZE);
        const result = await this.trx
          .insertInto('grade_results')
          .values(
            chunk.map((row) => ({
              student_id: row.studentId,
              exam_event_id: row.examEventId,
              grade: row.grade,
              transaction_id: row.transactionId,
            }))
          )
          .executeTakeFirst();
        inserted += Number(result.numInsertedOrUpdatedRows ?? 0n);
      }
      return ok(inserted);
    } catch (error) {
      return wrapError(error, 'Failed to insert grade results');
    }
  }

  async commit(): Promise<Result<void, Error>> {
    const openCheck = this.ensureOpen('commit');
    if (openCheck.isErr()) return err(openCheck.error);

    try {
      await this.trx.commit().execute();
      this.state = 'committed';
      return ok();
    } catch (error) {
      // A failed COMMIT keeps the connection; roll back to hand it back
      try {
        await this.trx.rollback().execute();
      } catch (rollbackError) {
        logger.error({ rollbackError, transactionId: this.transactionId }, 'Failed to roll back after commit failure');
      }
      this.state = 'failed';
      return wrapError(error, `Failed to commit transaction ${this.transactionId}`);
    }
  }

  async abort(): Promise<Result<void, Error>> {
    const openCheck = this.ensureOpen('abort');
    if (openCheck.isErr()) return err(openCheck.error);

    try {
      await this.trx.rollback().execute();
      this.state = 'aborted';
      return ok();
    } catch (error) {
      this.state = 'failed';
      return wrapError(error, `Failed to abort transaction ${this.transactionId}`);
    }
  }

  private ensureOpen(operation: string): Result<void, Error> {
    if (this.state !== 'open') {
      return err(new Error(`Cannot ${operation}: transaction ${this.transactionId} is already ${this.state}`));
    }
    return ok();
  }
}
