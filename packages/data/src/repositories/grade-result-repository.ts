import type { GradeResultRow } from '@gradebook/core';
import { wrapError } from '@gradebook/core';
import type { Selectable } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { GradeResultsTable } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';

export function toGradeResultRow(row: Selectable<GradeResultsTable>): GradeResultRow {
  return {
    studentId: row.student_id,
    examEventId: row.exam_event_id,
    grade: row.grade,
    transactionId: row.transaction_id,
  };
}

/**
 * Read access to committed grade results. Writes only happen through a
 * TransactionHandle.
 */
export class GradeResultRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'GradeResultRepository');
  }

  async findByTransactionId(transactionId: number): Promise<Result<GradeResultRow[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('grade_results')
        .selectAll()
        .where('transaction_id', '=', transactionId)
        .orderBy('id')
        .execute();
      return ok(rows.map(toGradeResultRow));
    } catch (error) {
      return wrapError(error, 'Failed to find grade results by transaction');
    }
  }

  async findByExamEventId(examEventId: number): Promise<Result<GradeResultRow[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('grade_results')
        .selectAll()
        .where('exam_event_id', '=', examEventId)
        .orderBy('student_id')
        .orderBy('id')
        .execute();
      return ok(rows.map(toGradeResultRow));
    } catch (error) {
      return wrapError(error, 'Failed to find grade results by exam event');
    }
  }

  async countByTransactionId(transactionId: number): Promise<Result<number, Error>> {
    try {
      const row = await this.db
        .selectFrom('grade_results')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .where('transaction_id', '=', transactionId)
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      return wrapError(error, 'Failed to count grade results');
    }
  }
}
