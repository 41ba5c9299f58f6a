// Tokenization service - the only reader and writer of the identity-bearing store
//
// Converts real identity into a stable opaque token before anything leaves
// the hospital domain, and resolves tokens back for hospital callers only.
// Every call is audited, successful or not.

import { randomUUID } from 'node:crypto';
import type {
  CallerContext,
  IdentityAttributes,
  IdentityMapping,
  Timestamp,
  Token,
  TokenizationAuditEntry,
  TokenizationOperation,
  TokenizeResult,
} from '@carechain/protocol';
import { isValidToken } from '@carechain/protocol';
import { UniqueConstraintError, type IdentityStoreContext } from '@carechain/repositories';
import {
  AccessDeniedError,
  AmbiguousIdentityError,
  RuntimeError,
  TokenNotFoundError,
  ValidationError,
} from '../errors.js';
import { silentLogger, describeError, type Logger } from '../logger.js';
import type { RetrySettings } from '../retry.js';
import { withStoreRetry } from '../store-retry.js';
import { createIdentityCipher } from './cipher.js';
import { deriveKeyHashes, findAttributeConflicts, mergeAttributes } from './key-derivation.js';
import { KeyedMutex } from './keyed-mutex.js';
import { createRandomTokenGenerator, type TokenGenerator } from './token-generator.js';

const DEFAULT_MAX_TOKEN_ATTEMPTS = 5;

export type TokenizationServiceOptions = {
  store: IdentityStoreContext;

  /** HMAC secret for key hashes */
  keySecret: string;

  /** Secret the identity blob key is derived from */
  encryptionKey: string;

  /** Attribute sets that identify a patient; first satisfied set is primary */
  keySets: string[][];

  retry: RetrySettings;
  generator?: TokenGenerator;
  logger?: Logger;
  now?: () => Date;

  /** Token collisions tolerated before giving up (default 5) */
  maxTokenAttempts?: number;
};

export type DeactivateResult = {
  token: Token;
  active: boolean;
  deactivatedAt?: Timestamp;
};

export interface TokenizationService {
  /**
   * Token for an identity, created on first sight. Hospital callers only.
   *
   * A known identity seen with a new key set keeps its token, provided the
   * attributes agree with what is stored.
   *
   * @throws ValidationError, AccessDeniedError, AmbiguousIdentityError, StoreUnavailableError
   */
  tokenize(attributes: IdentityAttributes, caller: CallerContext): Promise<TokenizeResult>;

  /**
   * Decrypted identity for a token. Hospital callers only.
   *
   * @throws ValidationError, AccessDeniedError, TokenNotFoundError, StoreUnavailableError
   */
  resolve(token: Token, caller: CallerContext): Promise<IdentityAttributes>;

  /**
   * Mark a mapping inactive. Idempotent; nothing is deleted. Hospital callers only.
   */
  deactivate(token: Token, caller: CallerContext): Promise<DeactivateResult>;
}

type Outcome<T> = {
  result: T;
  token?: Token;
  details: Record<string, unknown>;
};

function assertCaller(caller: unknown): asserts caller is CallerContext {
  if (!caller || typeof caller !== 'object') {
    throw new ValidationError('invalid_caller', { field: 'caller' });
  }
  const c: Record<string, unknown> = { ...caller };
  if (typeof c.callerId !== 'string' || c.callerId.trim() === '') {
    throw new ValidationError('invalid_caller', { field: 'caller.callerId' });
  }
  if (c.domain !== 'hospital' && c.domain !== 'processing') {
    throw new ValidationError('invalid_caller', { field: 'caller.domain' });
  }
  if (typeof c.purpose !== 'string' || c.purpose.trim() === '') {
    throw new ValidationError('invalid_caller', { field: 'caller.purpose' });
  }
}

function assertAttributes(attributes: unknown): asserts attributes is IdentityAttributes {
  if (!attributes || typeof attributes !== 'object' || Array.isArray(attributes)) {
    throw new ValidationError('invalid_attributes', { field: 'attributes' });
  }
  for (const [name, value] of Object.entries(attributes)) {
    if (typeof value !== 'string') {
      throw new ValidationError('invalid_attributes', { field: `attributes.${name}` });
    }
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

/**
 * Create a tokenization service over an identity-bearing store.
 *
 * @example
 * ```typescript
 * const service = createTokenizationService({
 *   store: createInMemoryIdentityStore(),
 *   keySecret: config.identityKeySecret,
 *   encryptionKey: config.identityEncryptionKey,
 *   keySets: config.identityKeySets,
 *   retry: config.retry,
 * });
 *
 * const { token } = await service.tokenize(
 *   { mrn: 'MRN-2025-001-BW', fullName: 'Bruce Wayne' },
 *   { callerId: 'intake-desk-3', domain: 'hospital', purpose: 'admission' }
 * );
 * ```
 */
export function createTokenizationService(options: TokenizationServiceOptions): TokenizationService {
  const { store, keySecret, keySets, retry } = options;
  const cipher = createIdentityCipher(options.encryptionKey);
  const generator = options.generator ?? createRandomTokenGenerator();
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const maxTokenAttempts = options.maxTokenAttempts ?? DEFAULT_MAX_TOKEN_ATTEMPTS;
  const mutex = new KeyedMutex();

  const storeCall = <T>(operation: string, fn: () => Promise<T>) =>
    withStoreRetry(operation, fn, retry, logger);

  async function appendAudit(entry: TokenizationAuditEntry): Promise<void> {
    await storeCall('audit.append', () => store.audit.append(entry));
  }

  /**
   * Run an operation and audit its outcome. A failed success-audit fails the call.
   */
  async function audited<T>(
    operation: TokenizationOperation,
    caller: unknown,
    requestedToken: Token | undefined,
    fn: (caller: CallerContext) => Promise<Outcome<T>>
  ): Promise<T> {
    try {
      assertCaller(caller);
      const outcome = await fn(caller);

      await appendAudit({
        id: randomUUID(),
        timestamp: now().toISOString(),
        operation,
        caller: auditCaller(caller),
        token: outcome.token,
        success: true,
        details: outcome.details,
      });

      return outcome.result;
    } catch (error) {
      logger.warn('Tokenization call failed', { operation, ...describeError(error) });
      try {
        await appendAudit({
          id: randomUUID(),
          timestamp: now().toISOString(),
          operation,
          caller: auditCaller(caller),
          token: requestedToken !== undefined && isValidToken(requestedToken) ? requestedToken : undefined,
          success: false,
          errorCode: errorCode(error),
          details: {},
        });
      } catch (auditError) {
        logger.error('Audit write failed', { operation, ...describeError(auditError) });
      }
      throw error;
    }
  }

  function requireHospital(caller: CallerContext, operation: TokenizationOperation): void {
    if (caller.domain !== 'hospital') {
      throw new AccessDeniedError(caller.callerId, operation);
    }
  }

  async function findExisting(keyHashes: string[]): Promise<IdentityMapping | null> {
    const tokens = await storeCall('identities.findTokensByKeyHashes', () =>
      store.identities.findTokensByKeyHashes(keyHashes)
    );
    if (tokens.length > 1) {
      throw new AmbiguousIdentityError('multiple_tokens', tokens.length);
    }
    if (tokens.length === 0) {
      return null;
    }
    const mapping = await storeCall('identities.getByToken', () =>
      store.identities.getByToken(tokens[0])
    );
    if (!mapping) {
      throw new RuntimeError('IDENTITY_STORE_INCONSISTENT', 'Key hash points at a missing mapping');
    }
    return mapping;
  }

  /**
   * Tie attributes to the mapping one of their key hashes matched.
   *
   * Key hashes not yet registered to the mapping are only added when the
   * attributes agree with the stored identity; the stored blob then gains
   * the new attributes, so a later contradicting key set is caught too.
   */
  async function reconcile(
    existing: IdentityMapping,
    attributes: IdentityAttributes,
    keyHashes: string[],
    attemptsLeft = 1
  ): Promise<IdentityMapping> {
    const registered = new Set(
      await storeCall('identities.getKeyHashes', () => store.identities.getKeyHashes(existing.token))
    );
    const missing = keyHashes.filter((keyHash) => !registered.has(keyHash));
    if (missing.length === 0) {
      return existing;
    }

    const stored = cipher.decrypt(existing.identityBlob);
    if (findAttributeConflicts(stored, attributes).length > 0) {
      throw new AmbiguousIdentityError('conflicting_attributes', 1);
    }

    try {
      const updated = await storeCall('identities.addKeys', () =>
        store.identities.addKeys({
          token: existing.token,
          keyHashes: missing,
          identityBlob: cipher.encrypt(mergeAttributes(stored, attributes)),
        })
      );
      if (!updated) {
        throw new RuntimeError('IDENTITY_STORE_INCONSISTENT', 'Matched mapping disappeared');
      }
      logger.info('Identity keys added', { token: existing.token, added: missing.length });
      return updated;
    } catch (error) {
      if (!(error instanceof UniqueConstraintError) || attemptsLeft === 0) throw error;

      // Another writer registered one of the keys meanwhile
      const current = await findExisting(keyHashes);
      if (!current) throw error;
      return reconcile(current, attributes, keyHashes, attemptsLeft - 1);
    }
  }

  async function createMapping(
    attributes: IdentityAttributes,
    keyHashes: string[]
  ): Promise<{ mapping: IdentityMapping; created: boolean }> {
    const identityBlob = cipher.encrypt(attributes);

    for (let attempt = 1; attempt <= maxTokenAttempts; attempt++) {
      const mapping: IdentityMapping = {
        patientKeyHash: keyHashes[0],
        token: generator.next(),
        identityBlob,
        createdAt: now().toISOString(),
        active: true,
      };

      try {
        const stored = await storeCall('identities.create', () =>
          store.identities.create({ mapping, keyHashes })
        );
        return { mapping: stored, created: true };
      } catch (error) {
        if (!(error instanceof UniqueConstraintError)) throw error;

        // Another writer registered this identity first, or the token collided
        const winner = await findExisting(keyHashes);
        if (winner) {
          return { mapping: await reconcile(winner, attributes, keyHashes), created: false };
        }
        logger.debug('Token collision, regenerating', { attempt });
      }
    }

    throw new RuntimeError('TOKEN_GENERATION_FAILED', 'Could not generate a unique token');
  }

  return {
    tokenize(attributes, caller) {
      return audited('tokenize', caller, undefined, async (ctx) => {
        requireHospital(ctx, 'tokenize');
        assertAttributes(attributes);

        const keyHashes = deriveKeyHashes(attributes, keySets, keySecret);
        if (keyHashes.length === 0) {
          throw new ValidationError('no_identity_key', { field: 'attributes' });
        }

        const { mapping, created } = await mutex.runExclusive(keyHashes, async () => {
          const existing = await findExisting(keyHashes);
          return existing
            ? { mapping: await reconcile(existing, attributes, keyHashes), created: false }
            : createMapping(attributes, keyHashes);
        });

        if (created) {
          logger.info('Identity tokenized', { token: mapping.token });
        }

        return {
          result: { token: mapping.token, created, active: mapping.active },
          token: mapping.token,
          details: { created, active: mapping.active },
        };
      });
    },

    resolve(token, caller) {
      return audited('resolve', caller, token, async (ctx) => {
        requireHospital(ctx, 'resolve');
        if (!isValidToken(token)) {
          throw new ValidationError('invalid_token', { field: 'token' });
        }

        const mapping = await storeCall('identities.getByToken', () =>
          store.identities.getByToken(token)
        );
        if (!mapping) {
          throw new TokenNotFoundError(token);
        }

        return {
          result: cipher.decrypt(mapping.identityBlob),
          token,
          details: { active: mapping.active },
        };
      });
    },

    deactivate(token, caller) {
      return audited('deactivate', caller, token, async (ctx) => {
        requireHospital(ctx, 'deactivate');
        if (!isValidToken(token)) {
          throw new ValidationError('invalid_token', { field: 'token' });
        }

        const mapping = await storeCall('identities.deactivate', () =>
          store.identities.deactivate(token, now().toISOString())
        );
        if (!mapping) {
          throw new TokenNotFoundError(token);
        }

        logger.info('Token deactivated', { token });

        return {
          result: { token, active: mapping.active, deactivatedAt: mapping.deactivatedAt },
          token,
          details: { deactivatedAt: mapping.deactivatedAt },
        };
      });
    },
  };
}

/**
 * Caller fields safe to persist even when the caller failed validation.
 */
function auditCaller(caller: unknown): CallerContext {
  const c: Record<string, unknown> = caller && typeof caller === 'object' ? { ...caller } : {};
  return {
    callerId: typeof c.callerId === 'string' ? c.callerId : 'unknown',
    domain: c.domain === 'hospital' ? 'hospital' : 'processing',
    purpose: typeof c.purpose === 'string' ? c.purpose : 'unknown',
  };
}
