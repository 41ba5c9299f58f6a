export { PgIdentityRepository } from './identity-repository.js';
export { PgTokenizationAuditRepository } from './tokenization-audit-repository.js';
export { PgAnalysisRepository } from './analysis-repository.js';
export { createPgIdentityStore, createPgProcessingStore } from './context.js';
