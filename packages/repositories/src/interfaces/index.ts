// Store contracts
// Implementations (Postgres, in-memory) fulfil these; the runtime codes against them only.

export type {
  IdentityRepository,
  CreateIdentityMappingInput,
  AddIdentityKeysInput,
} from './identity-repository.js';

export type {
  TokenizationAuditRepository,
  TokenizationAuditFilter,
} from './tokenization-audit-repository.js';

export type { AnalysisRepository } from './analysis-repository.js';

export type {
  IdentityStoreContext,
  ProcessingStoreContext,
  StoreContextFactory,
} from './repository-context.js';
