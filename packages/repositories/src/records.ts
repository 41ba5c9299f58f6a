// Ledger rules shared by every AnalysisRepository implementation

import type { AgentAnalysisRecord } from '@carechain/protocol';
import { AcyclicityViolation } from './errors.js';

/**
 * Check a record's parent link against the stored parent.
 *
 * @param parent - the stored record named by `record.parentAnalysisId`, or null if absent
 * @throws AcyclicityViolation
 */
export function assertValidParent(
  record: AgentAnalysisRecord,
  parent: AgentAnalysisRecord | null
): void {
  const parentId = record.parentAnalysisId;
  if (parentId === undefined) return;

  if (parentId === record.analysisId) {
    throw new AcyclicityViolation(record.analysisId, parentId, 'self_reference');
  }
  if (!parent) {
    throw new AcyclicityViolation(record.analysisId, parentId, 'missing_parent');
  }
  if (parent.caseSession !== record.caseSession) {
    throw new AcyclicityViolation(record.analysisId, parentId, 'foreign_session');
  }
  if (Date.parse(parent.createdAt) >= Date.parse(record.createdAt)) {
    throw new AcyclicityViolation(record.analysisId, parentId, 'not_earlier');
  }
}

/**
 * Whether two records carry the same content. Used to tell an idempotent
 * retry from a conflicting write under the same id.
 */
export function isSameRecord(a: AgentAnalysisRecord, b: AgentAnalysisRecord): boolean {
  return fingerprint(a) === fingerprint(b);
}

function fingerprint(record: AgentAnalysisRecord): string {
  return JSON.stringify([
    record.analysisId,
    record.agentType,
    record.token,
    record.caseSession,
    record.status,
    record.inputSnapshot,
    record.outputSnapshot,
    record.confidenceScores,
    record.evidenceReferences,
    record.escalationTriggers,
    record.parentAnalysisId ?? null,
    record.processingTimeMs,
    Date.parse(record.createdAt),
  ]);
}

/**
 * Ledger order: createdAt, then analysisId.
 */
export function compareRecords(a: AgentAnalysisRecord, b: AgentAnalysisRecord): number {
  const byTime = Date.parse(a.createdAt) - Date.parse(b.createdAt);
  if (byTime !== 0) return byTime;
  return a.analysisId < b.analysisId ? -1 : a.analysisId > b.analysisId ? 1 : 0;
}
