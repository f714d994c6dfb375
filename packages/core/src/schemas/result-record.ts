import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

export const MIN_STUDENT_ID = 1_000_000;
export const MAX_STUDENT_ID = 9_999_999;

/** Grades are stored as the decimal grade times ten: 1.0 → 10, 10.0 → 100 */
export const MIN_GRADE = 10;
export const MAX_GRADE = 100;

export const IdSchema = z.number().int().positive();

export const StudentIdSchema = z.number().int().min(MIN_STUDENT_ID).max(MAX_STUDENT_ID);

export const GradeSchema = z.number().int().min(MIN_GRADE).max(MAX_GRADE);

export const ResultRecordSchema = z
  .object({
    studentId: StudentIdSchema,
    examEventId: IdSchema,
    grade: GradeSchema,
    transactionId: IdSchema,
  })
  .strict();

export type ResultRecordInput = z.input<typeof ResultRecordSchema>;

/**
 * One validated exam result, ready to be written as a grade_results row.
 */
export type ResultRecord = Readonly<z.infer<typeof ResultRecordSchema>>;

/**
 * Only way to build a ResultRecord outside the parser. Returned records are frozen.
 */
export function createResultRecord(input: ResultRecordInput): Result<ResultRecord, ValidationError> {
  const parsed = ResultRecordSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(
      new ValidationError(`Invalid result record: ${details}`, {
        additionalContext: { input },
        transactionId: input.transactionId,
      })
    );
  }
  return ok(Object.freeze(parsed.data));
}
