// @carechain/repositories
// Store contracts and their implementations.
//
// Two stores sit on either side of the privacy boundary:
// - the identity-bearing store (identity mappings, key hashes, tokenization audit)
// - the processing store (the token-keyed agent analysis ledger)
//
// The runtime codes against the interfaces only, so Postgres and in-memory
// implementations are interchangeable.

export * from './interfaces/index.js';
export * from './errors.js';
export { assertValidParent, isSameRecord, compareRecords } from './records.js';
export {
  createInMemoryIdentityStore,
  createInMemoryProcessingStore,
} from './in-memory/index.js';
export type {
  InMemoryIdentityStore,
  InMemoryProcessingStore,
  InMemoryIdentityData,
  InMemoryProcessingData,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
