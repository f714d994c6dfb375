import type { ParsedLine, ParseFailure, ParseFailureReason, ResultRecord } from '@gradebook/core';
import { IdSchema, ValidationError, createResultRecord } from '@gradebook/core';
import { getLogger } from '@gradebook/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

const logger = getLogger('ResultLineParser');

/** Exactly seven digits, no leading zero */
const STUDENT_ID_TOKEN = /^[1-9]\d{6}$/;

/** `10`, or one digit 1-9 with an optional single decimal after `,` or `.` */
const GRADE_TOKEN = /^(?:10|([1-9])(?:[.,](\d))?)$/;

export const ParserContextSchema = z.object({
  examEventId: IdSchema,
  transactionId: IdSchema,
});

/**
 * Values shared by every record of one submission.
 */
export type ParserContext = z.infer<typeof ParserContextSchema>;

/**
 * Converts a grade token to tenths without going through floating point.
 * Returns undefined for anything that is not a valid grade token.
 */
export function scaleGrade(token: string): number | undefined {
  const match = GRADE_TOKEN.exec(token);
  if (!match) return undefined;

  const [, whole, tenth] = match;
  if (whole === undefined) return 100;
  return Number(whole) * 10 + Number(tenth ?? '0');
}

/**
 * Splits a results file into lines. Drops a leading BOM and the empty
 * line that follows a final newline.
 */
export function splitLines(text: string): string[] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function classify(tokens: readonly string[], studentIdIndex: number): ParseFailureReason {
  const hasStudentId = studentIdIndex >= 0;
  const hasGradeToken = tokens.some((token, index) => index !== studentIdIndex && scaleGrade(token) !== undefined);

  if (!hasStudentId && !hasGradeToken) return 'neither-found';
  if (!hasStudentId) return 'student-id-missing';
  if (!hasGradeToken) return 'grade-missing';
  // Both are on the line but the grade is not the final column
  return 'malformed';
}

/**
 * Turns free-form result lines into ResultRecords.
 *
 * Columns are separated by runs of whitespace. The first 7-digit column is the
 * student id and the last column must be the grade; everything else on the
 * line is ignored. Parsing is pure: the same line always gives the same result.
 */
export class ResultLineParser {
  static create(context: ParserContext): Result<ResultLineParser, ValidationError> {
    const parsed = ParserContextSchema.safeParse(context);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new ValidationError(`Invalid parser context: ${details}`));
    }
    return ok(new ResultLineParser(parsed.data));
  }

  private constructor(readonly context: Readonly<ParserContext>) {}

  parseLine(line: string, lineNumber = 1): ParsedLine {
    const tokens = line
      .trim()
      .split(/\s+/)
      .filter((token) => token.length > 0);

    if (tokens.length === 0) {
      return err(this.failure(line, lineNumber, 'blank'));
    }

    const studentIdIndex = tokens.findIndex((token) => STUDENT_ID_TOKEN.test(token));
    const lastIndex = tokens.length - 1;
    const lastToken = tokens[lastIndex];
    const grade = lastIndex !== studentIdIndex && lastToken !== undefined ? scaleGrade(lastToken) : undefined;
    const studentIdToken = tokens[studentIdIndex];

    if (studentIdToken === undefined || grade === undefined) {
      return err(this.failure(line, lineNumber, classify(tokens, studentIdIndex)));
    }

    return this.toRecord(Number(studentIdToken), grade, line, lineNumber);
  }

  /**
   * Parses every line of a submission. Line numbers start at 1.
   */
  parseLines(lines: readonly string[]): ParsedLine[] {
    return lines.map((line, index) => this.parseLine(line, index + 1));
  }

  private toRecord(studentId: number, grade: number, line: string, lineNumber: number): Result<ResultRecord, ParseFailure> {
    const recordResult = createResultRecord({
      studentId,
      examEventId: this.context.examEventId,
      grade,
      transactionId: this.context.transactionId,
    });

    if (recordResult.isErr()) {
      logger.warn({ error: recordResult.error, lineNumber }, 'Extracted values failed record validation');
      return err(this.failure(line, lineNumber, 'malformed'));
    }

    return ok(recordResult.value);
  }

  private failure(line: string, lineNumber: number, reason: ParseFailureReason): ParseFailure {
    return { lineNumber, line, reason };
  }
}
