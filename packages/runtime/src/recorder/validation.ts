// Record validation - everything checked before a record reaches the store
//
// Errors name the rule and the field, never the value.

import {
  findIdentityLeaks,
  isValidToken,
  type AgentAnalysisRecord,
  type AnalysisStatus,
  type ConfidenceScores,
  type JsonObject,
  type JsonValue,
} from '@carechain/protocol';
import { ValidationError } from '../errors.js';

export const AGENT_TYPE_PATTERN = /^[a-z][a-z0-9_]{1,63}$/;
export const CASE_SESSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]{0,127}$/;

const ANALYSIS_STATUSES: readonly AnalysisStatus[] = ['completed', 'failed'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether a value survives a JSON round trip unchanged.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isPlainObject(value)) return Object.values(value).every(isJsonValue);
  return false;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isPlainObject(value) && isJsonValue(value);
}

export function validateAgentType(agentType: unknown): string {
  if (typeof agentType !== 'string' || !AGENT_TYPE_PATTERN.test(agentType)) {
    throw new ValidationError('invalid_agent_type', { field: 'agentType' });
  }
  return agentType;
}

export function validateToken(token: unknown, field = 'token'): string {
  if (!isValidToken(token)) {
    throw new ValidationError('invalid_token', { field });
  }
  return token;
}

export function validateCaseSession(caseSession: unknown): string {
  if (typeof caseSession !== 'string' || !CASE_SESSION_PATTERN.test(caseSession)) {
    throw new ValidationError('invalid_case_session', { field: 'caseSession' });
  }
  return caseSession;
}

export function validateConfidenceScores(scores: unknown): ConfidenceScores {
  if (scores === undefined) return {};
  if (!isPlainObject(scores)) {
    throw new ValidationError('invalid_confidence', { field: 'confidenceScores' });
  }
  const result: ConfidenceScores = {};
  // Field names carry the entry position; score names are caller text.
  for (const [index, [name, value]] of Object.entries(scores).entries()) {
    if (name.length === 0 || typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new ValidationError('invalid_confidence', { field: `confidenceScores[${index}]` });
    }
    result[name] = value;
  }
  return result;
}

export function validateEvidence(evidence: unknown): string[] {
  if (evidence === undefined) return [];
  if (!Array.isArray(evidence)) {
    throw new ValidationError('invalid_evidence', { field: 'evidenceReferences' });
  }
  return evidence.map((ref, index) => {
    if (typeof ref !== 'string' || ref.trim() === '') {
      throw new ValidationError('invalid_evidence', { field: `evidenceReferences[${index}]` });
    }
    return ref;
  });
}

export function validateSnapshot(snapshot: unknown, field: string): JsonObject {
  if (!isJsonObject(snapshot)) {
    throw new ValidationError('invalid_snapshot', { field });
  }
  return snapshot;
}

export function validateStatus(status: unknown): AnalysisStatus {
  if (status === undefined) return 'completed';
  const match = ANALYSIS_STATUSES.find((candidate) => candidate === status);
  if (match === undefined) {
    throw new ValidationError('invalid_status', { field: 'status' });
  }
  return match;
}

export function validateParentId(parentAnalysisId: unknown): string | undefined {
  if (parentAnalysisId === undefined || parentAnalysisId === null) return undefined;
  if (typeof parentAnalysisId !== 'string' || parentAnalysisId.trim() === '') {
    throw new ValidationError('invalid_parent', { field: 'parentAnalysisId' });
  }
  return parentAnalysisId;
}

/** Every caller-supplied field of a record; the rest is generated here */
export type LeakScanCandidate = Omit<
  AgentAnalysisRecord,
  'analysisId' | 'createdAt' | 'processingTimeMs' | 'escalationTriggers'
>;

/**
 * Reject a record that carries raw identity in any field, value or key.
 * The error details list paths and rule names only.
 */
export function assertNoIdentityLeaks(candidate: LeakScanCandidate): void {
  const findings = findIdentityLeaks(candidate);
  if (findings.length > 0) {
    throw new ValidationError('identity_leak', { details: { findings } });
  }
}
