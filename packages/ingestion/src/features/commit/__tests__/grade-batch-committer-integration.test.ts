/**
 * Runs the committer against a real SQLite handle to check what actually
 * becomes durable.
 */
import type { GradebookDataContext } from '@gradebook/data';
import { createTestDataContext, type KyselyTransactionHandle } from '@gradebook/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ResultLineParser } from '../../parsing/result-line-parser.js';
import { GradeBatchCommitter } from '../grade-batch-committer.js';

describe('GradeBatchCommitter with a SQLite handle', () => {
  let dataContext: GradebookDataContext;

  beforeEach(async () => {
    dataContext = await createTestDataContext();
    (await dataContext.examEvents.create({ name: 'Algebra final', date: new Date('2026-06-01T00:00:00Z') }))._unsafeUnwrap();
  });

  afterEach(async () => {
    await dataContext.close();
  });

  async function begin(): Promise<KyselyTransactionHandle> {
    return (await dataContext.beginSubmission({ userId: 8 }))._unsafeUnwrap();
  }

  function parse(lines: string[], transactionId: number, examEventId = 1) {
    return ResultLineParser.create({ examEventId, transactionId })._unsafeUnwrap().parseLines(lines);
  }

  it('makes every row of a committed submission durable', async () => {
    const handle = await begin();
    const transactionId = handle.id();

    const result = await new GradeBatchCommitter().insertGrades(
      parse(['1234567  A  B  7,7', '7654321 name 9'], transactionId),
      handle
    );

    expect(result._unsafeUnwrap().state).toBe('committed');
    expect(handle.status).toBe('committed');
    expect((await dataContext.gradeResults.findByTransactionId(transactionId))._unsafeUnwrap()).toEqual([
      { studentId: 1234567, examEventId: 1, grade: 77, transactionId },
      { studentId: 7654321, examEventId: 1, grade: 90, transactionId },
    ]);
    expect((await dataContext.transactionRecords.findById(transactionId))._unsafeUnwrap()).toEqual({
      id: transactionId,
      userId: 8,
      transactionDate: expect.stringMatching(/^\d{4}-\d{2}-\d{2}$/),
    });
  });

  it('leaves nothing behind when a strict submission has a bad line', async () => {
    const handle = await begin();
    const transactionId = handle.id();

    const result = await new GradeBatchCommitter().insertGrades(parse(['1234567 8', 'badline'], transactionId), handle);

    expect(result._unsafeUnwrap().state).toBe('aborted');
    expect(handle.status).toBe('aborted');
    expect((await dataContext.gradeResults.countByTransactionId(transactionId))._unsafeUnwrap()).toBe(0);
    expect((await dataContext.transactionRecords.findById(transactionId))._unsafeUnwrap()).toBeUndefined();
  });

  it('rolls back rows already written when the store rejects the batch', async () => {
    const handle = await begin();
    const transactionId = handle.id();

    // Exam event 2 does not exist, so the batch violates the foreign key
    const result = await new GradeBatchCommitter({ policy: 'best-effort' }).insertGrades(
      parse(['1234567 8', '7654321 9'], transactionId, 2),
      handle
    );

    const outcome = result._unsafeUnwrap();
    expect(outcome.state).toBe('aborted');
    if (outcome.state === 'aborted') {
      expect(outcome.reason.kind).toBe('persistence');
    }
    expect(handle.status).toBe('aborted');
    expect((await dataContext.gradeResults.countByTransactionId(transactionId))._unsafeUnwrap()).toBe(0);
  });

  it('lets the next submission run once the previous one is finalized', async () => {
    const committer = new GradeBatchCommitter({ policy: 'best-effort' });

    const first = await begin();
    await committer.insertGrades(parse(['1234567 8', 'badline'], first.id()), first);
    const second = await begin();
    await committer.insertGrades(parse(['7654321 6,5'], second.id()), second);

    const rows = (await dataContext.gradeResults.findByExamEventId(1))._unsafeUnwrap();
    expect(rows).toEqual([
      { studentId: 1234567, examEventId: 1, grade: 80, transactionId: first.id() },
      { studentId: 7654321, examEventId: 1, grade: 65, transactionId: second.id() },
    ]);
  });
});
