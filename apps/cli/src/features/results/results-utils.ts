import type { GradeResultRow } from '@gradebook/core';

/**
 * Grades are stored in tenths; 77 prints as "7.7" and 100 as "10".
 */
export function formatGrade(grade: number): string {
  const whole = Math.floor(grade / 10);
  const tenth = grade % 10;
  return tenth === 0 ? String(whole) : `${whole}.${tenth}`;
}

export function formatResultRow(row: GradeResultRow): string {
  return `${row.studentId}  ${formatGrade(row.grade).padStart(4)}  (exam event ${row.examEventId}, transaction ${row.transactionId})`;
}
