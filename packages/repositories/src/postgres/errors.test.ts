import { describe, it, expect } from 'vitest';
import { toRepositoryError, withStoreErrors } from './errors.js';
import {
  AcyclicityViolation,
  StoreUnavailableError,
  UniqueConstraintError,
} from '../errors.js';

function driverError(fields: Record<string, string>): Error {
  return Object.assign(new Error('driver failure'), fields);
}

describe('toRepositoryError', () => {
  it('maps unique violations with the constraint name', () => {
    const mapped = toRepositoryError(
      driverError({ code: '23505', constraint_name: 'identity_keys_pkey' }),
      'identity'
    );

    expect(mapped).toBeInstanceOf(UniqueConstraintError);
    expect(mapped).toMatchObject({ constraint: 'identity_keys_pkey' });
  });

  it.each(['08006', '57P01', '53300', 'ECONNREFUSED', 'CONNECTION_CLOSED'])(
    'maps %s to StoreUnavailableError',
    (code) => {
      const mapped = toRepositoryError(driverError({ code }), 'processing');

      expect(mapped).toBeInstanceOf(StoreUnavailableError);
      expect(mapped).toMatchObject({ store: 'processing', code: 'STORE_UNAVAILABLE' });
    }
  );

  it('passes other errors through unchanged', () => {
    const syntax = driverError({ code: '42601' });
    const plain = new Error('boom');
    const violation = new AcyclicityViolation('a-2', 'a-1', 'missing_parent');

    expect(toRepositoryError(syntax, 'processing')).toBe(syntax);
    expect(toRepositoryError(plain, 'processing')).toBe(plain);
    expect(toRepositoryError(violation, 'processing')).toBe(violation);
  });
});

describe('withStoreErrors', () => {
  it('rethrows translated errors', async () => {
    await expect(
      withStoreErrors('identity', async () => {
        throw driverError({ code: 'ECONNRESET' });
      })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('returns the operation result', async () => {
    await expect(withStoreErrors('identity', async () => 42)).resolves.toBe(42);
  });
});
