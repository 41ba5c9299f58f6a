import { describe, it, expect, beforeEach } from 'vitest';
import type { CallerContext } from '@carechain/protocol';
import {
  createInMemoryIdentityStore,
  StoreUnavailableError,
  type IdentityStoreContext,
  type InMemoryIdentityStore,
} from '@carechain/repositories';
import { createTokenizationService, type TokenizationServiceOptions } from './service.js';
import { createSequenceTokenGenerator } from './token-generator.js';
import {
  AccessDeniedError,
  AmbiguousIdentityError,
  TokenNotFoundError,
  ValidationError,
} from '../errors.js';

const hospital: CallerContext = {
  callerId: 'intake-desk-3',
  domain: 'hospital',
  purpose: 'admission',
};

const processing: CallerContext = {
  callerId: 'risk-agent',
  domain: 'processing',
  purpose: 'analysis',
};

const bruce = {
  mrn: 'MRN-2025-001-BW',
  fullName: 'Bruce Wayne',
  dateOfBirth: '1980-02-19',
};

const retry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => {} };

function makeService(
  store: IdentityStoreContext,
  tokens: string[] = ['batman_ab12cd34', 'superman_00000001', 'robin_0000beef'],
  overrides: Partial<TokenizationServiceOptions> = {}
) {
  return createTokenizationService({
    store,
    keySecret: 'test-secret-for-keys',
    encryptionKey: 'test-secret-for-blobs',
    keySets: [['mrn'], ['fullName', 'dateOfBirth']],
    retry,
    generator: createSequenceTokenGenerator(tokens),
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  });
}

describe('TokenizationService', () => {
  let store: InMemoryIdentityStore;

  beforeEach(() => {
    store = createInMemoryIdentityStore();
  });

  describe('tokenize', () => {
    it('creates a token once and returns it on later calls', async () => {
      const service = makeService(store);

      const first = await service.tokenize(bruce, hospital);
      const second = await service.tokenize(bruce, hospital);

      expect(first).toEqual({ token: 'batman_ab12cd34', created: true, active: true });
      expect(second).toEqual({ token: 'batman_ab12cd34', created: false, active: true });
      expect(store._data.mappings.size).toBe(1);
      expect(store._data.keys.size).toBe(2);
    });

    it('normalizes names and values before hashing', async () => {
      const service = makeService(store);

      const a = await service.tokenize({ fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' }, hospital);
      const b = await service.tokenize(
        { full_name: '  bruce   WAYNE ', 'Date-Of-Birth': '1980-02-19' },
        hospital
      );

      expect(b.token).toBe(a.token);
      expect(b.created).toBe(false);
    });

    it('finds an identity through any of its key sets', async () => {
      const service = makeService(store);

      const { token } = await service.tokenize(bruce, hospital);
      const byMrnOnly = await service.tokenize({ mrn: 'mrn-2025-001-bw' }, hospital);

      expect(byMrnOnly.token).toBe(token);
    });

    it('yields one token for concurrent calls', async () => {
      const service = makeService(store);

      const results = await Promise.all(
        Array.from({ length: 5 }, () => service.tokenize(bruce, hospital))
      );

      expect(new Set(results.map((r) => r.token))).toEqual(new Set(['batman_ab12cd34']));
      expect(results.filter((r) => r.created)).toHaveLength(1);
      expect(store._data.mappings.size).toBe(1);
    });

    it('yields one token when two service instances race on one store', async () => {
      const a = makeService(store, ['batman_ab12cd34']);
      const b = makeService(store, ['superman_00000001']);

      const [ra, rb] = await Promise.all([a.tokenize(bruce, hospital), b.tokenize(bruce, hospital)]);

      expect(ra.token).toBe(rb.token);
      expect(store._data.mappings.size).toBe(1);
    });

    it('regenerates on token collision', async () => {
      await makeService(store, ['batman_ab12cd34']).tokenize(bruce, hospital);
      const service = makeService(store, ['batman_ab12cd34', 'robin_0000beef']);

      const result = await service.tokenize({ mrn: 'MRN-2025-002-DG' }, hospital);

      expect(result).toEqual({ token: 'robin_0000beef', created: true, active: true });
    });

    it('refuses to merge identities that match different tokens', async () => {
      const service = makeService(store);
      await service.tokenize({ mrn: 'MRN-1' }, hospital);
      await service.tokenize({ fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' }, hospital);

      await expect(
        service.tokenize({ mrn: 'MRN-1', fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' }, hospital)
      ).rejects.toBeInstanceOf(AmbiguousIdentityError);

      const failures = await store.audit.query({ success: false });
      expect(failures.map((e) => e.errorCode)).toEqual(['AMBIGUOUS_IDENTITY']);
    });

    it('refuses a second patient who shares a name and birth date but not the MRN', async () => {
      const service = makeService(store);
      const first = await service.tokenize(
        { mrn: 'MRN-A1000', fullName: 'Bruce Wayne', dateOfBirth: '1972-02-19' },
        hospital
      );

      const error = await service
        .tokenize({ mrn: 'MRN-B2000', fullName: 'Bruce Wayne', dateOfBirth: '1972-02-19' }, hospital)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AmbiguousIdentityError);
      expect(error).toMatchObject({ reason: 'conflicting_attributes' });
      expect(store._data.mappings.size).toBe(1);
      expect(store._data.keys.size).toBe(2);
      await expect(service.resolve(first.token, hospital)).resolves.toEqual({
        mrn: 'MRN-A1000',
        fullName: 'Bruce Wayne',
        dateOfBirth: '1972-02-19',
      });
    });

    it('adds a new key set to a known identity instead of splitting it', async () => {
      const service = makeService(store);
      const first = await service.tokenize({ fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' }, hospital);

      const withMrn = await service.tokenize(bruce, hospital);
      const mrnOnly = await service.tokenize({ mrn: 'MRN-2025-001-BW' }, hospital);

      expect(withMrn).toEqual({ token: first.token, created: false, active: true });
      expect(mrnOnly.token).toBe(first.token);
      expect(store._data.mappings.size).toBe(1);
      expect(store._data.keys.size).toBe(2);
      await expect(service.resolve(first.token, hospital)).resolves.toEqual(bruce);
    });

    it('catches a contradicting MRN once the merged identity carries one', async () => {
      const service = makeService(store);
      await service.tokenize({ fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' }, hospital);
      await service.tokenize(bruce, hospital);

      await expect(
        service.tokenize({ ...bruce, mrn: 'MRN-2025-002-XX' }, hospital)
      ).rejects.toMatchObject({ code: 'AMBIGUOUS_IDENTITY', reason: 'conflicting_attributes' });
      expect(store._data.keys.size).toBe(2);
    });

    it('rejects attributes that satisfy no key set', async () => {
      const service = makeService(store);

      const error = await service.tokenize({ fullName: 'Bruce Wayne' }, hospital).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ reason: 'no_identity_key' });
      expect(store._data.mappings.size).toBe(0);
    });

    it('denies processing-side callers', async () => {
      const service = makeService(store);

      await expect(service.tokenize(bruce, processing)).rejects.toBeInstanceOf(AccessDeniedError);
      expect(store._data.mappings.size).toBe(0);
      expect(store._data.audit).toHaveLength(1);
      expect(store._data.audit[0]).toMatchObject({
        operation: 'tokenize',
        success: false,
        errorCode: 'ACCESS_DENIED',
        caller: processing,
      });
    });

    it('stores identity only in encrypted form', async () => {
      const service = makeService(store);
      await service.tokenize(bruce, hospital);

      const mapping = store._data.mappings.get('batman_ab12cd34');
      expect(mapping?.identityBlob.startsWith('v1:')).toBe(true);
      expect(mapping?.identityBlob).not.toContain('Bruce');
      expect(mapping?.patientKeyHash).toMatch(/^[0-9a-f]{64}$/);
    });

    it('keeps attributes and key hashes out of the audit log', async () => {
      const service = makeService(store);
      await service.tokenize(bruce, hospital);
      await service.resolve('batman_ab12cd34', hospital);

      const audit = JSON.stringify(store._data.audit);
      expect(audit).not.toContain('Bruce');
      expect(audit).not.toContain('MRN-2025-001-BW');
      for (const keyHash of store._data.keys.keys()) {
        expect(audit).not.toContain(keyHash);
      }
      expect(store._data.audit.map((e) => [e.operation, e.success, e.token])).toEqual([
        ['tokenize', true, 'batman_ab12cd34'],
        ['resolve', true, 'batman_ab12cd34'],
      ]);
    });

    it('retries a store that is briefly unavailable', async () => {
      let failures = 2;
      const flaky: IdentityStoreContext = {
        audit: store.audit,
        identities: {
          ...store.identities,
          async findTokensByKeyHashes(keyHashes) {
            if (failures > 0) {
              failures--;
              throw new StoreUnavailableError('identity');
            }
            return store.identities.findTokensByKeyHashes(keyHashes);
          },
        },
      };

      const result = await makeService(flaky).tokenize(bruce, hospital);

      expect(result.token).toBe('batman_ab12cd34');
      expect(failures).toBe(0);
    });

    it('fails closed when the store stays unavailable', async () => {
      let calls = 0;
      const down: IdentityStoreContext = {
        audit: store.audit,
        identities: {
          ...store.identities,
          async findTokensByKeyHashes() {
            calls++;
            throw new StoreUnavailableError('identity');
          },
        },
      };

      await expect(makeService(down).tokenize(bruce, hospital)).rejects.toBeInstanceOf(
        StoreUnavailableError
      );
      expect(calls).toBe(3);
      expect(store._data.mappings.size).toBe(0);
    });
  });

  describe('resolve', () => {
    it('returns the original attributes to hospital callers', async () => {
      const service = makeService(store);
      const { token } = await service.tokenize(bruce, hospital);

      await expect(service.resolve(token, hospital)).resolves.toEqual(bruce);
    });

    it('denies processing-side callers', async () => {
      const service = makeService(store);
      const { token } = await service.tokenize(bruce, hospital);

      await expect(service.resolve(token, processing)).rejects.toBeInstanceOf(AccessDeniedError);

      const [entry] = await store.audit.query({ operation: 'resolve' });
      expect(entry).toMatchObject({ success: false, errorCode: 'ACCESS_DENIED', token });
    });

    it('rejects malformed tokens and reports unknown ones', async () => {
      const service = makeService(store);

      await expect(service.resolve('Bruce Wayne', hospital)).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        reason: 'invalid_token',
      });
      await expect(service.resolve('batman_ffffffff', hospital)).rejects.toBeInstanceOf(
        TokenNotFoundError
      );
    });

    it('rejects a malformed caller context', async () => {
      const service = makeService(store);

      await expect(
        service.resolve('batman_ab12cd34', { callerId: '', domain: 'hospital', purpose: 'x' })
      ).rejects.toMatchObject({ reason: 'invalid_caller' });
    });
  });

  describe('deactivate', () => {
    it('marks the mapping inactive without deleting it', async () => {
      const service = makeService(store);
      const { token } = await service.tokenize(bruce, hospital);

      const result = await service.deactivate(token, hospital);
      const again = await service.tokenize(bruce, hospital);

      expect(result).toEqual({
        token,
        active: false,
        deactivatedAt: '2026-01-01T00:00:00.000Z',
      });
      expect(again).toEqual({ token, created: false, active: false });
      await expect(service.resolve(token, hospital)).resolves.toEqual(bruce);
    });

    it('is idempotent', async () => {
      const service = makeService(store);
      const { token } = await service.tokenize(bruce, hospital);

      await service.deactivate(token, hospital);
      await expect(service.deactivate(token, hospital)).resolves.toMatchObject({ active: false });
    });

    it('reports unknown tokens', async () => {
      await expect(makeService(store).deactivate('batman_ffffffff', hospital)).rejects.toBeInstanceOf(
        TokenNotFoundError
      );
    });
  });
});
