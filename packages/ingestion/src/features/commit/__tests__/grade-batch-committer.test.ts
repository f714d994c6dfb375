import type { ParsedLine, TransactionHandle } from '@gradebook/core';
import { FinalizeError, PersistenceError } from '@gradebook/core';
import { err, ok } from 'neverthrow';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ResultLineParser } from '../../parsing/result-line-parser.js';
import { GradeBatchCommitter } from '../grade-batch-committer.js';

const mockLogger = vi.hoisted(() => ({
  audit: vi.fn(),
  debug: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
}));

vi.mock('@gradebook/logger', () => ({
  getLogger: () => mockLogger,
}));

function createFakeHandle(transactionId = 42) {
  return {
    id: vi.fn<TransactionHandle['id']>(() => transactionId),
    insertGradeResults: vi.fn<TransactionHandle['insertGradeResults']>((rows) => Promise.resolve(ok(rows.length))),
    commit: vi.fn<TransactionHandle['commit']>(() => Promise.resolve(ok())),
    abort: vi.fn<TransactionHandle['abort']>(() => Promise.resolve(ok())),
  };
}

type FakeHandle = ReturnType<typeof createFakeHandle>;

function parse(lines: readonly string[], transactionId = 42, examEventId = 5): ParsedLine[] {
  return ResultLineParser.create({ examEventId, transactionId })._unsafeUnwrap().parseLines(lines);
}

function finalizeCalls(handle: FakeHandle): number {
  return handle.commit.mock.calls.length + handle.abort.mock.calls.length;
}

describe('GradeBatchCommitter', () => {
  let handle: FakeHandle;

  beforeEach(() => {
    vi.clearAllMocks();
    handle = createFakeHandle();
  });

  it('defaults to the strict policy and skipping blank lines', () => {
    const committer = new GradeBatchCommitter();

    expect(committer.policy).toBe('strict');
    expect(committer.skipBlankLines).toBe(true);
  });

  describe('strict policy', () => {
    const committer = new GradeBatchCommitter({ policy: 'strict' });

    it('inserts every record and commits', async () => {
      const entries = parse(['1234567  A  B  7,7', '7654321 name 9']);

      const result = await committer.insertGrades(entries, handle);

      expect(handle.insertGradeResults).toHaveBeenCalledTimes(1);
      expect(handle.insertGradeResults).toHaveBeenCalledWith([
        { studentId: 1234567, examEventId: 5, grade: 77, transactionId: 42 },
        { studentId: 7654321, examEventId: 5, grade: 90, transactionId: 42 },
      ]);
      expect(handle.commit).toHaveBeenCalledTimes(1);
      expect(handle.abort).not.toHaveBeenCalled();
      expect(result._unsafeUnwrap()).toEqual({
        transactionId: 42,
        policy: 'strict',
        failures: [],
        skipped: [],
        state: 'committed',
        committedCount: 2,
      });
    });

    it('writes an audit line for a committed submission', async () => {
      await committer.insertGrades(parse(['1234567 8']), handle);

      expect(mockLogger.audit).toHaveBeenCalledWith(
        { transactionId: 42, committedCount: 1, failures: 0, policy: 'strict' },
        'Submission committed'
      );
    });

    it('aborts without inserting when any line fails to parse', async () => {
      const entries = parse(['1234567 8', 'badline']);
      expect(entries[0]?._unsafeUnwrap()).toMatchObject({ studentId: 1234567, grade: 80 });

      const result = await committer.insertGrades(entries, handle);

      expect(handle.insertGradeResults).not.toHaveBeenCalled();
      expect(handle.abort).toHaveBeenCalledTimes(1);
      expect(handle.commit).not.toHaveBeenCalled();
      expect(result._unsafeUnwrap()).toEqual({
        transactionId: 42,
        policy: 'strict',
        failures: [{ lineNumber: 2, line: 'badline', reason: 'neither-found' }],
        skipped: [],
        state: 'aborted',
        committedCount: 0,
        reason: { kind: 'parse-failures' },
      });
      expect(mockLogger.audit).not.toHaveBeenCalled();
    });

    it('reports every failure in input order', async () => {
      const result = await committer.insertGrades(parse(['name 7,5', '1234567 8', '1234567 10.5']), handle);

      expect(result._unsafeUnwrap().failures.map((failure) => [failure.lineNumber, failure.reason])).toEqual([
        [1, 'student-id-missing'],
        [3, 'grade-missing'],
      ]);
    });

    it('leaves blank lines out of the submission', async () => {
      const result = await committer.insertGrades(parse(['1234567 8', '', '7654321 9']), handle);

      const outcome = result._unsafeUnwrap();
      expect(outcome.state).toBe('committed');
      expect(outcome.committedCount).toBe(2);
      expect(outcome.failures).toEqual([]);
      expect(outcome.skipped).toEqual([{ lineNumber: 2, line: '', reason: 'blank' }]);
    });

    it('counts blank lines as failures when they are not skipped', async () => {
      const keepBlanks = new GradeBatchCommitter({ policy: 'strict', skipBlankLines: false });

      const result = await keepBlanks.insertGrades(parse(['1234567 8', '   ']), handle);

      const outcome = result._unsafeUnwrap();
      expect(outcome.state).toBe('aborted');
      expect(outcome.failures).toEqual([{ lineNumber: 2, line: '   ', reason: 'blank' }]);
      expect(outcome.skipped).toEqual([]);
      expect(handle.abort).toHaveBeenCalledTimes(1);
    });
  });

  describe('best-effort policy', () => {
    const committer = new GradeBatchCommitter({ policy: 'best-effort' });

    it('commits the valid lines and reports the failures', async () => {
      const result = await committer.insertGrades(parse(['1234567 8', 'badline']), handle);

      expect(handle.insertGradeResults).toHaveBeenCalledWith([
        { studentId: 1234567, examEventId: 5, grade: 80, transactionId: 42 },
      ]);
      expect(handle.commit).toHaveBeenCalledTimes(1);
      expect(result._unsafeUnwrap()).toEqual({
        transactionId: 42,
        policy: 'best-effort',
        failures: [{ lineNumber: 2, line: 'badline', reason: 'neither-found' }],
        skipped: [],
        state: 'committed',
        committedCount: 1,
      });
    });

    it('aborts when no line parses', async () => {
      const result = await committer.insertGrades(parse(['badline', 'name 7,5']), handle);

      const outcome = result._unsafeUnwrap();
      expect(outcome.state).toBe('aborted');
      expect(outcome.failures).toHaveLength(2);
      if (outcome.state === 'aborted') {
        expect(outcome.reason).toEqual({ kind: 'empty-submission' });
      }
      expect(handle.insertGradeResults).not.toHaveBeenCalled();
      expect(handle.abort).toHaveBeenCalledTimes(1);
    });

    it('aborts the whole submission on a persistence error', async () => {
      handle.insertGradeResults.mockResolvedValueOnce(err(new Error('disk I/O error')));

      const result = await committer.insertGrades(parse(['1234567 8', '7654321 9', 'badline']), handle);

      const outcome = result._unsafeUnwrap();
      expect(outcome.state).toBe('aborted');
      expect(outcome.committedCount).toBe(0);
      expect(handle.commit).not.toHaveBeenCalled();
      expect(handle.abort).toHaveBeenCalledTimes(1);
    });
  });

  describe('empty submission', () => {
    it('aborts when there are no lines', async () => {
      const result = await new GradeBatchCommitter().insertGrades([], handle);

      expect(result._unsafeUnwrap()).toEqual({
        transactionId: 42,
        policy: 'strict',
        failures: [],
        skipped: [],
        state: 'aborted',
        committedCount: 0,
        reason: { kind: 'empty-submission' },
      });
      expect(handle.abort).toHaveBeenCalledTimes(1);
    });

    it('aborts when every line is blank', async () => {
      const result = await new GradeBatchCommitter().insertGrades(parse(['', ' ']), handle);

      const outcome = result._unsafeUnwrap();
      expect(outcome.state).toBe('aborted');
      expect(outcome.skipped).toHaveLength(2);
      if (outcome.state === 'aborted') {
        expect(outcome.reason.kind).toBe('empty-submission');
      }
    });
  });

  describe('persistence errors', () => {
    const committer = new GradeBatchCommitter();

    it('rejects records stamped with another transaction before inserting', async () => {
      const result = await committer.insertGrades(parse(['1234567 8'], 41), handle);

      const outcome = result._unsafeUnwrap();
      expect(handle.insertGradeResults).not.toHaveBeenCalled();
      expect(handle.abort).toHaveBeenCalledTimes(1);
      expect(outcome.state).toBe('aborted');
      if (outcome.state === 'aborted' && outcome.reason.kind === 'persistence') {
        expect(outcome.reason.error).toBeInstanceOf(PersistenceError);
        expect(outcome.reason.error.phase).toBe('stage');
        expect(outcome.reason.error.message).toBe('Record 1 belongs to transaction 41, not 42');
      } else {
        expect.unreachable('expected a persistence abort');
      }
    });

    it('aborts when the batch insert returns an error', async () => {
      const cause = new Error('FOREIGN KEY constraint failed');
      handle.insertGradeResults.mockResolvedValueOnce(err(cause));

      const result = await committer.insertGrades(parse(['1234567 8']), handle);

      const outcome = result._unsafeUnwrap();
      expect(handle.commit).not.toHaveBeenCalled();
      expect(handle.abort).toHaveBeenCalledTimes(1);
      if (outcome.state === 'aborted' && outcome.reason.kind === 'persistence') {
        expect(outcome.reason.error.phase).toBe('flush');
        expect(outcome.reason.error.message).toBe('FOREIGN KEY constraint failed');
        expect(outcome.reason.error.cause).toBe(cause);
        expect(outcome.reason.error.transactionId).toBe(42);
      } else {
        expect.unreachable('expected a persistence abort');
      }
    });

    it('treats a throwing batch insert as a flush error', async () => {
      handle.insertGradeResults.mockRejectedValueOnce(new Error('connection reset'));

      const result = await committer.insertGrades(parse(['1234567 8']), handle);

      const outcome = result._unsafeUnwrap();
      expect(handle.abort).toHaveBeenCalledTimes(1);
      if (outcome.state === 'aborted' && outcome.reason.kind === 'persistence') {
        expect(outcome.reason.error.phase).toBe('flush');
        expect(outcome.reason.error.message).toBe('Batch insert threw: connection reset');
      } else {
        expect.unreachable('expected a persistence abort');
      }
    });

    it('aborts when the store accepts fewer rows than were staged', async () => {
      handle.insertGradeResults.mockResolvedValueOnce(ok(1));

      const result = await committer.insertGrades(parse(['1234567 8', '7654321 9']), handle);

      const outcome = result._unsafeUnwrap();
      expect(handle.commit).not.toHaveBeenCalled();
      if (outcome.state === 'aborted' && outcome.reason.kind === 'persistence') {
        expect(outcome.reason.error.message).toBe('Store accepted 1 of 2 staged rows');
      } else {
        expect.unreachable('expected a persistence abort');
      }
    });
  });

  describe('finalize errors', () => {
    const committer = new GradeBatchCommitter();

    it('returns a FinalizeError when commit fails', async () => {
      handle.commit.mockResolvedValueOnce(err(new Error('database is locked')));

      const result = await committer.insertGrades(parse(['1234567 8']), handle);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(FinalizeError);
        expect(result.error.operation).toBe('commit');
        expect(result.error.message).toBe('Failed to commit transaction 42: database is locked');
        expect(result.error.transactionId).toBe(42);
      }
      expect(handle.abort).not.toHaveBeenCalled();
      expect(mockLogger.audit).not.toHaveBeenCalled();
    });

    it('returns a FinalizeError when commit throws', async () => {
      handle.commit.mockRejectedValueOnce(new Error('disk full'));

      const result = await committer.insertGrades(parse(['1234567 8']), handle);

      expect(result._unsafeUnwrapErr().message).toBe('Failed to commit transaction 42: disk full');
      expect(handle.commit).toHaveBeenCalledTimes(1);
      expect(handle.abort).not.toHaveBeenCalled();
    });

    it('returns a FinalizeError when abort fails after a parse failure', async () => {
      handle.abort.mockResolvedValueOnce(err(new Error('connection lost')));

      const result = await committer.insertGrades(parse(['badline']), handle);

      const error = result._unsafeUnwrapErr();
      expect(error.operation).toBe('abort');
      expect(error.message).toBe('Failed to abort transaction 42: connection lost');
      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause).not.toBeInstanceOf(PersistenceError);
    });

    it('keeps the persistence error as the cause when abort fails after it', async () => {
      handle.insertGradeResults.mockResolvedValueOnce(err(new Error('FOREIGN KEY constraint failed')));
      handle.abort.mockRejectedValueOnce(new Error('connection lost'));

      const result = await committer.insertGrades(parse(['1234567 8']), handle);

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(FinalizeError);
      expect(error).not.toBeInstanceOf(PersistenceError);
      expect(error.operation).toBe('abort');
      expect(error.cause).toBeInstanceOf(PersistenceError);
      expect(handle.abort).toHaveBeenCalledTimes(1);
      expect(handle.commit).not.toHaveBeenCalled();
    });
  });

  describe('finalization', () => {
    it.each<[string, string[], (handle: FakeHandle) => void]>([
      ['a clean submission', ['1234567 8'], () => undefined],
      ['a parse failure', ['1234567 8', 'badline'], () => undefined],
      ['an empty submission', [], () => undefined],
      ['a flush error', ['1234567 8'], (h) => h.insertGradeResults.mockResolvedValueOnce(err(new Error('x')))],
      ['a throwing flush', ['1234567 8'], (h) => h.insertGradeResults.mockRejectedValueOnce(new Error('x'))],
      ['a failed commit', ['1234567 8'], (h) => h.commit.mockResolvedValueOnce(err(new Error('x')))],
      ['a failed abort', ['badline'], (h) => h.abort.mockResolvedValueOnce(err(new Error('x')))],
    ])('ends the transaction exactly once after %s', async (_label, lines, arrange) => {
      arrange(handle);

      await new GradeBatchCommitter().insertGrades(parse(lines), handle);

      expect(finalizeCalls(handle)).toBe(1);
    });
  });
});
