// Store error types
//
// Raised by every repository implementation so callers can tell transient
// infrastructure failures from integrity violations without knowing the
// underlying driver.

/**
 * Base class for all repository errors.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
    this.code = code;
  }
}

/**
 * The store could not be reached or refused the operation for a
 * transient reason. Safe to retry.
 */
export class StoreUnavailableError extends RepositoryError {
  readonly store: string;

  constructor(store: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', `The ${store} store is unavailable`, options);
    this.name = 'StoreUnavailableError';
    this.store = store;
  }
}

/**
 * A write collided with an existing unique key.
 */
export class UniqueConstraintError extends RepositoryError {
  readonly constraint: string;

  constructor(constraint: string, options?: { cause?: unknown }) {
    super('UNIQUE_CONSTRAINT', `Unique constraint violated: ${constraint}`, options);
    this.name = 'UniqueConstraintError';
    this.constraint = constraint;
  }
}

export type AcyclicityViolationReason =
  | 'self_reference'
  | 'missing_parent'
  | 'foreign_session'
  | 'not_earlier';

/**
 * An analysis write referenced a parent that does not exist, belongs to
 * another case session, or is not strictly earlier. Nothing was written.
 */
export class AcyclicityViolation extends RepositoryError {
  readonly analysisId: string;
  readonly parentAnalysisId: string;
  readonly reason: AcyclicityViolationReason;

  constructor(analysisId: string, parentAnalysisId: string, reason: AcyclicityViolationReason) {
    super(
      'ACYCLICITY_VIOLATION',
      `Analysis ${analysisId} cannot reference parent ${parentAnalysisId}: ${reason}`
    );
    this.name = 'AcyclicityViolation';
    this.analysisId = analysisId;
    this.parentAnalysisId = parentAnalysisId;
    this.reason = reason;
  }
}
