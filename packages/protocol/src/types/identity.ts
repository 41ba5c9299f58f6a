// Identity types - these live only on the hospital side of the boundary

import type { Id, Timestamp, Token } from './common.js';

/**
 * Raw identity attributes as supplied by hospital intake.
 * Keys are attribute names (e.g. "fullName", "dateOfBirth", "mrn").
 *
 * These values never leave the tokenization service.
 */
export type IdentityAttributes = Record<string, string>;

/**
 * Which side of the privacy boundary a caller runs on.
 */
export type CallerDomain = 'hospital' | 'processing';

/**
 * Identifies the system making a tokenization call.
 */
export type CallerContext = {
  /** Stable identifier of the calling system or staff member */
  callerId: string;

  /** Boundary side; only hospital callers may see identity */
  domain: CallerDomain;

  /** Why the call is made; recorded in the audit log */
  purpose: string;
};

/**
 * A row in the identity-bearing store.
 */
export type IdentityMapping = {
  /** Keyed hash of the primary identity key set */
  patientKeyHash: string;

  token: Token;

  /** Encrypted identity attributes (see the cipher envelope format) */
  identityBlob: string;

  createdAt: Timestamp;

  /** False once deactivated; mappings are never deleted */
  active: boolean;

  deactivatedAt?: Timestamp;
};

export type TokenizationOperation = 'tokenize' | 'resolve' | 'deactivate';

/**
 * Append-only audit entry for every tokenization service call.
 * Carries the token at most - never attributes or key hashes.
 */
export type TokenizationAuditEntry = {
  id: Id;
  timestamp: Timestamp;
  operation: TokenizationOperation;
  caller: CallerContext;
  token?: Token;
  success: boolean;
  errorCode?: string;
  details: Record<string, unknown>;
};

/**
 * Result of a tokenize call.
 */
export type TokenizeResult = {
  token: Token;

  /** True when this call created the mapping */
  created: boolean;

  /** Whether the mapping is still active */
  active: boolean;
};
