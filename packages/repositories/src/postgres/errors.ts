// Driver error classification
//
// postgres.js surfaces SQLSTATE codes on `code`, and connection failures as
// Node system error codes or its own CONNECTION_* codes.

import { RepositoryError, StoreUnavailableError, UniqueConstraintError } from '../errors.js';

const UNAVAILABLE_CODES = new Set([
  // admin shutdown, crash shutdown, cannot connect now, too many connections
  '57P01',
  '57P02',
  '57P03',
  '53300',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function readConstraint(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'constraint_name' in error) {
    return typeof error.constraint_name === 'string' ? error.constraint_name : 'unknown';
  }
  return 'unknown';
}

/**
 * Map a driver error to the repository taxonomy.
 * Errors already in the taxonomy, and unrecognised errors, are returned as-is.
 */
export function toRepositoryError(error: unknown, store: string): unknown {
  if (error instanceof RepositoryError) {
    return error;
  }

  const code = readCode(error);
  if (code === undefined) {
    return error;
  }
  if (code === '23505') {
    return new UniqueConstraintError(readConstraint(error), { cause: error });
  }
  // class 08: connection exception
  if (code.startsWith('08') || UNAVAILABLE_CODES.has(code)) {
    return new StoreUnavailableError(store, { cause: error });
  }
  return error;
}

/**
 * Run a store operation, translating driver errors.
 */
export async function withStoreErrors<T>(store: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toRepositoryError(error, store);
  }
}
