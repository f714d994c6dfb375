import { wrapError } from '@gradebook/core';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';

import { BaseRepository } from './base-repository.js';

/**
 * Who committed a submission, and on which day.
 */
export interface TransactionRecord {
  id: number;
  userId: number;
  transactionDate: string;
}

/**
 * Read access to the transactions relation. Rows are written by
 * KyselyTransactionHandle when a submission starts.
 */
export class TransactionRecordRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'TransactionRecordRepository');
  }

  async findById(transactionId: number): Promise<Result<TransactionRecord | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('transactions')
        .selectAll()
        .where('id', '=', transactionId)
        .executeTakeFirst();

      if (!row) {
        return ok(undefined);
      }

      return ok({ id: row.id, userId: row.user_id, transactionDate: row.transaction_date });
    } catch (error) {
      return wrapError(error, 'Failed to find transaction record by ID');
    }
  }

  async findByUserId(userId: number): Promise<Result<TransactionRecord[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('transactions')
        .selectAll()
        .where('user_id', '=', userId)
        .orderBy('id')
        .execute();

      return ok(rows.map((row) => ({ id: row.id, userId: row.user_id, transactionDate: row.transaction_date })));
    } catch (error) {
      return wrapError(error, 'Failed to find transaction records by user');
    }
  }
}
