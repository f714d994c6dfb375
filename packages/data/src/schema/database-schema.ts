import type { ColumnType, Generated } from 'kysely';

/**
 * Database schema definitions. Column names are snake_case to match the tables.
 */

// 'YYYY-MM-DD'
export type DateString = ColumnType<string, string, string>;
// ISO 8601 timestamp set by SQLite
export type CreatedAt = ColumnType<string, string | undefined, never>;

export interface ExamEventsTable {
  id: Generated<number>;
  name: string;
  notes: string | null;
  event_date: DateString;
  created_at: CreatedAt;
}

/**
 * One row per committed submission: who committed it and when.
 */
export interface TransactionsTable {
  id: Generated<number>;
  user_id: number;
  transaction_date: DateString;
}

export interface GradeResultsTable {
  id: Generated<number>;
  student_id: number;
  exam_event_id: number;
  /** Decimal grade times ten, 10..100 */
  grade: number;
  transaction_id: number;
}

export interface DatabaseSchema {
  exam_events: ExamEventsTable;
  grade_results: GradeResultsTable;
  transactions: TransactionsTable;
}
