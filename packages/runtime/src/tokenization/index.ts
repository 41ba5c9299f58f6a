export {
  createTokenizationService,
  type TokenizationService,
  type TokenizationServiceOptions,
  type DeactivateResult,
} from './service.js';
export {
  createRandomTokenGenerator,
  createSequenceTokenGenerator,
  TOKEN_ALIASES,
  type TokenGenerator,
} from './token-generator.js';
export { createIdentityCipher, IdentityBlobError, type IdentityCipher } from './cipher.js';
export {
  deriveKeyHashes,
  normalizeAttributes,
  normalizeAttributeName,
  normalizeAttributeValue,
  findAttributeConflicts,
  mergeAttributes,
} from './key-derivation.js';
export { KeyedMutex } from './keyed-mutex.js';
