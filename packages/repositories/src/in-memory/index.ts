// In-memory store implementations for development and testing
//
// Useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts. Stored values are frozen copies,
// so callers cannot mutate the ledger through a returned reference.

import type {
  AgentAnalysisRecord,
  IdentityMapping,
  Token,
  TokenizationAuditEntry,
} from '@carechain/protocol';
import type {
  IdentityStoreContext,
  ProcessingStoreContext,
  IdentityRepository,
  TokenizationAuditRepository,
  AnalysisRepository,
} from '../interfaces/index.js';
import { UniqueConstraintError } from '../errors.js';
import { assertValidParent, compareRecords, isSameRecord } from '../records.js';

/**
 * Underlying data of the identity store (for debugging/testing).
 */
export interface InMemoryIdentityData {
  /** token -> mapping */
  mappings: Map<Token, IdentityMapping>;
  /** key hash -> token */
  keys: Map<string, Token>;
  audit: TokenizationAuditEntry[];
}

/**
 * Underlying data of the processing store (for debugging/testing).
 */
export interface InMemoryProcessingData {
  analyses: Map<string, AgentAnalysisRecord>;
  /** caseSession -> analysis ids in insertion order */
  sessions: Map<string, string[]>;
  /** token -> case sessions in order of first appearance */
  tokens: Map<Token, string[]>;
}

export interface InMemoryIdentityStore extends IdentityStoreContext {
  /** Direct access to underlying data (for debugging/testing) */
  _data: InMemoryIdentityData;
  /** Clear all data */
  clear(): void;
}

export interface InMemoryProcessingStore extends ProcessingStoreContext {
  /** Direct access to underlying data (for debugging/testing) */
  _data: InMemoryProcessingData;
  /** Clear all data */
  clear(): void;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function snapshot<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

/**
 * Create an in-memory identity-bearing store.
 *
 * @example
 * ```typescript
 * const identity = createInMemoryIdentityStore();
 * const service = createTokenizationService({ store: identity, ... });
 *
 * console.log(identity._data.mappings.size);
 * identity.clear();
 * ```
 */
export function createInMemoryIdentityStore(): InMemoryIdentityStore {
  const mappings = new Map<Token, IdentityMapping>();
  const keys = new Map<string, Token>();
  const audit: TokenizationAuditEntry[] = [];

  const identities: IdentityRepository = {
    async findTokensByKeyHashes(keyHashes) {
      const found = new Set<Token>();
      for (const keyHash of keyHashes) {
        const token = keys.get(keyHash);
        if (token !== undefined) found.add(token);
      }
      return Array.from(found).sort();
    },

    async getKeyHashes(token) {
      const registered: string[] = [];
      for (const [keyHash, owner] of keys) {
        if (owner === token) registered.push(keyHash);
      }
      return registered.sort();
    },

    async getByToken(token) {
      return mappings.get(token) ?? null;
    },

    async create(input) {
      const { mapping } = input;
      const keyHashes = Array.from(new Set([mapping.patientKeyHash, ...input.keyHashes]));

      if (mappings.has(mapping.token)) {
        throw new UniqueConstraintError('identity_mappings_token_unique');
      }
      if (keyHashes.some((keyHash) => keys.has(keyHash))) {
        throw new UniqueConstraintError('identity_keys_pkey');
      }

      const stored = snapshot(mapping);
      mappings.set(stored.token, stored);
      for (const keyHash of keyHashes) {
        keys.set(keyHash, stored.token);
      }
      return stored;
    },

    async addKeys(input) {
      const existing = mappings.get(input.token);
      if (!existing) return null;

      const fresh = Array.from(new Set(input.keyHashes)).filter((keyHash) => {
        const owner = keys.get(keyHash);
        if (owner !== undefined && owner !== input.token) {
          throw new UniqueConstraintError('identity_keys_pkey');
        }
        return owner === undefined;
      });

      const updated = snapshot({ ...existing, identityBlob: input.identityBlob });
      mappings.set(updated.token, updated);
      for (const keyHash of fresh) {
        keys.set(keyHash, updated.token);
      }
      return updated;
    },

    async deactivate(token, at) {
      const existing = mappings.get(token);
      if (!existing) return null;
      if (!existing.active) return existing;

      const updated = snapshot({ ...existing, active: false, deactivatedAt: at });
      mappings.set(token, updated);
      return updated;
    },
  };

  const auditRepo: TokenizationAuditRepository = {
    async append(entry) {
      audit.push(snapshot(entry));
    },

    async query(filter) {
      let result = audit.slice();

      if (filter.token) {
        result = result.filter((e) => e.token === filter.token);
      }
      if (filter.callerId) {
        result = result.filter((e) => e.caller.callerId === filter.callerId);
      }
      if (filter.operation) {
        result = result.filter((e) => e.operation === filter.operation);
      }
      if (filter.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }
      if (filter.since) {
        const since = Date.parse(filter.since);
        result = result.filter((e) => Date.parse(e.timestamp) >= since);
      }
      if (filter.until) {
        const until = Date.parse(filter.until);
        result = result.filter((e) => Date.parse(e.timestamp) <= until);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }

      return result;
    },
  };

  return {
    identities,
    audit: auditRepo,
    _data: { mappings, keys, audit },
    clear() {
      mappings.clear();
      keys.clear();
      audit.length = 0;
    },
  };
}

/**
 * Create an in-memory processing store.
 */
export function createInMemoryProcessingStore(): InMemoryProcessingStore {
  const analyses = new Map<string, AgentAnalysisRecord>();
  const sessions = new Map<string, string[]>();
  const tokens = new Map<Token, string[]>();

  const recordsOf = (ids: string[]): AgentAnalysisRecord[] =>
    ids.flatMap((id) => {
      const record = analyses.get(id);
      return record ? [record] : [];
    });

  const analysisRepo: AnalysisRepository = {
    async append(record) {
      const existing = analyses.get(record.analysisId);
      if (existing) {
        if (isSameRecord(existing, record)) return existing;
        throw new UniqueConstraintError('agent_analyses_pkey');
      }

      const parent =
        record.parentAnalysisId !== undefined
          ? analyses.get(record.parentAnalysisId) ?? null
          : null;
      assertValidParent(record, parent);

      const stored = snapshot(record);
      analyses.set(stored.analysisId, stored);

      const sessionIds = sessions.get(stored.caseSession) ?? [];
      sessionIds.push(stored.analysisId);
      sessions.set(stored.caseSession, sessionIds);

      const tokenSessions = tokens.get(stored.token) ?? [];
      if (!tokenSessions.includes(stored.caseSession)) {
        tokenSessions.push(stored.caseSession);
      }
      tokens.set(stored.token, tokenSessions);

      return stored;
    },

    async get(analysisId) {
      return analyses.get(analysisId) ?? null;
    },

    async getBySession(caseSession) {
      return recordsOf(sessions.get(caseSession) ?? []).sort(compareRecords);
    },

    async query(filter) {
      let result = filter.caseSession
        ? recordsOf(sessions.get(filter.caseSession) ?? [])
        : Array.from(analyses.values());

      if (filter.token) {
        result = result.filter((r) => r.token === filter.token);
      }
      if (filter.agentType) {
        result = result.filter((r) => r.agentType === filter.agentType);
      }
      if (filter.timeRange?.start) {
        const start = Date.parse(filter.timeRange.start);
        result = result.filter((r) => Date.parse(r.createdAt) >= start);
      }
      if (filter.timeRange?.end) {
        const end = Date.parse(filter.timeRange.end);
        result = result.filter((r) => Date.parse(r.createdAt) <= end);
      }

      result.sort(compareRecords);

      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }

      return result;
    },

    async listSessionsForToken(token) {
      return (tokens.get(token) ?? []).slice();
    },
  };

  return {
    analyses: analysisRepo,
    _data: { analyses, sessions, tokens },
    clear() {
      analyses.clear();
      sessions.clear();
      tokens.clear();
    },
  };
}
