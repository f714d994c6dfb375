import { describe, expect, it } from 'vitest';

import { DomainError, FinalizeError, PersistenceError } from './index.js';

describe('PersistenceError', () => {
  it('records the phase that failed', () => {
    const error = new PersistenceError('flush', 'Batch insert failed', { transactionId: 42 });

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('PersistenceError');
    expect(error.code).toBe('PERSISTENCE_ERROR');
    expect(error.toJSON()).toMatchObject({
      code: 'PERSISTENCE_ERROR',
      message: 'Batch insert failed',
      phase: 'flush',
      transactionId: 42,
    });
  });
});

describe('FinalizeError', () => {
  it('is distinct from PersistenceError and keeps its cause', () => {
    const cause = new PersistenceError('stage', 'Row rejected');
    const error = new FinalizeError('abort', 'Rollback failed', undefined, { cause });

    expect(error).not.toBeInstanceOf(PersistenceError);
    expect(error.code).toBe('FINALIZE_ERROR');
    expect(error.operation).toBe('abort');
    expect(error.cause).toBe(cause);
  });
});
