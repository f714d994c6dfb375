import type { Result } from 'neverthrow';

import type { ResultRecord } from '../schemas/result-record.js';

/**
 * Why a line did not yield a ResultRecord.
 *
 * - `neither-found`: no student id and no grade-like token
 * - `student-id-missing`: a grade-like token but no 7-digit student id
 * - `grade-missing`: a student id but no valid grade anywhere on the line
 * - `malformed`: both present, but the grade is not the final token
 * - `blank`: empty or whitespace-only line
 */
export type ParseFailureReason = 'neither-found' | 'student-id-missing' | 'grade-missing' | 'malformed' | 'blank';

export interface ParseFailure {
  readonly lineNumber: number;
  readonly line: string;
  readonly reason: ParseFailureReason;
}

export type ParsedLine = Result<ResultRecord, ParseFailure>;

/**
 * Row shape of the grade_results relation.
 */
export interface GradeResultRow {
  studentId: number;
  examEventId: number;
  grade: number;
  transactionId: number;
}
