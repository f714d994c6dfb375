/**
 * Domain error hierarchy.
 *
 * Parse problems are not errors: they are {@link ParseFailure} values. The
 * classes below cover what can go wrong once records reach the store.
 */

interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  transactionId?: number | undefined;
}

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly transactionId?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext, options?: ErrorOptions) {
    super(message, options);
    this.timestamp = new Date().toISOString();
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
  readonly severity = 'error' as const;
}

export type PersistencePhase = 'stage' | 'flush';

/**
 * The store rejected staged work. The submission was aborted, so none of
 * its rows were applied.
 */
export class PersistenceError extends DomainError {
  readonly code = 'PERSISTENCE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly phase: PersistencePhase,
    message: string,
    context?: ErrorContext,
    options?: ErrorOptions
  ) {
    super(message, context, options);
  }

  override toJSON() {
    return { ...super.toJSON(), phase: this.phase };
  }
}

export type FinalizeOperation = 'commit' | 'abort';

/**
 * Commit or abort itself failed. Whether the submission's rows were applied
 * is unknown to the caller.
 */
export class FinalizeError extends DomainError {
  readonly code = 'FINALIZE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    public readonly operation: FinalizeOperation,
    message: string,
    context?: ErrorContext,
    options?: ErrorOptions
  ) {
    super(message, context, options);
  }

  override toJSON() {
    return { ...super.toJSON(), operation: this.operation };
  }
}
