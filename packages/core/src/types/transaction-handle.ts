import type { Result } from 'neverthrow';

import type { GradeResultRow } from './result-record.js';

/**
 * One open transaction, owned by the persistence layer.
 *
 * The caller acquires it before committing a submission. Exactly one of
 * `commit` or `abort` ends it, and either releases the underlying connection.
 * Calling a terminal operation on a finished handle returns an error and has
 * no effect.
 */
export interface TransactionHandle {
  /** Transaction id stamped onto every row written under this handle. */
  id(): number;

  /** Writes all rows as one batch inside the transaction. Resolves to the number of rows written. */
  insertGradeResults(rows: readonly GradeResultRow[]): Promise<Result<number, Error>>;

  commit(): Promise<Result<void, Error>>;

  abort(): Promise<Result<void, Error>>;
}
