import type { Database } from '../db.js';
import type { IdentityStoreContext, ProcessingStoreContext } from '../../interfaces/index.js';
import { PgIdentityRepository } from './identity-repository.js';
import { PgTokenizationAuditRepository } from './tokenization-audit-repository.js';
import { PgAnalysisRepository } from './analysis-repository.js';

/**
 * Create the identity-bearing store backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.IDENTITY_DATABASE_URL });
 * const identity = createPgIdentityStore(db);
 * ```
 */
export function createPgIdentityStore(db: Database): IdentityStoreContext {
  return {
    identities: new PgIdentityRepository(db),
    audit: new PgTokenizationAuditRepository(db),
  };
}

/**
 * Create the processing store backed by Postgres.
 */
export function createPgProcessingStore(db: Database): ProcessingStoreContext {
  return {
    analyses: new PgAnalysisRepository(db),
  };
}
