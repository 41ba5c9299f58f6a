// @carechain/protocol
// Shared vocabulary for both sides of the privacy boundary.

export * from './types/index.js';

export {
  TOKEN_PATTERN,
  isValidToken,
  normalizeTokenAlias,
  formatToken,
} from './validation/tokens.js';

export {
  DISALLOWED_IDENTITY_KEYS,
  IDENTITY_PATTERNS,
  isIdentityKey,
  findIdentityLeaks,
  type IdentityLeak,
  type IdentityLeakCode,
} from './validation/identity.js';

export {
  parseNdjson,
  stringifyNdjsonLine,
} from './ndjson.js';
