import type { IdentityRepository } from './identity-repository.js';
import type { TokenizationAuditRepository } from './tokenization-audit-repository.js';
import type { AnalysisRepository } from './analysis-repository.js';

/**
 * Repositories of the identity-bearing store.
 *
 * Held only by the tokenization service. Nothing on the processing side
 * of the boundary is given this context.
 */
export interface IdentityStoreContext {
  readonly identities: IdentityRepository;
  readonly audit: TokenizationAuditRepository;
}

/**
 * Repositories of the processing store (token-keyed, identity-free).
 *
 * Example usage:
 * ```typescript
 * const processing = createPgProcessingStore(db);
 * const recorder = createRecorder({ processing, ... });
 * ```
 */
export interface ProcessingStoreContext {
  readonly analyses: AnalysisRepository;
}

/**
 * Factory type for creating a store context from configuration.
 */
export type StoreContextFactory<TContext, TConfig = unknown> = (
  config: TConfig
) => TContext | Promise<TContext>;
