// Analysis chain recorder - the single write path into the processing store
//
// validate -> leak scan -> timestamp -> evaluate triggers -> append (retried)
// -> publish escalation. A record that fails to append is never escalated.

import { randomUUID } from 'node:crypto';
import type {
  AgentAnalysisRecord,
  AnalysisStatus,
  EscalationEvent,
  EscalationSeverity,
  Id,
  Token,
} from '@carechain/protocol';
import type { ProcessingStoreContext } from '@carechain/repositories';
import type { CompiledEscalationRule } from '../escalation/rules.js';
import { evaluateEscalationRules } from '../escalation/rules.js';
import type { EscalationPublisher, PublishOutcome } from '../escalation/publisher.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RetrySettings } from '../retry.js';
import { withStoreRetry } from '../store-retry.js';
import { createMonotonicClock, type MonotonicClock } from './clock.js';
import {
  assertNoIdentityLeaks,
  validateAgentType,
  validateCaseSession,
  validateConfidenceScores,
  validateEvidence,
  validateParentId,
  validateSnapshot,
  validateStatus,
  validateToken,
} from './validation.js';

/**
 * What an agent hands to `record`. Values are checked at run time, so
 * payloads decoded from the wire can be passed straight through.
 */
export type RecordInput = {
  agentType: string;
  token: Token;
  caseSession: string;
  inputSnapshot: unknown;
  outputSnapshot: unknown;
  confidenceScores?: Record<string, number>;
  evidenceReferences?: string[];
  parentAnalysisId?: Id;
  status?: AnalysisStatus;
  /** Clock milliseconds when the agent started work */
  startedAt?: number;
};

export type RecordResult = {
  analysisId: Id;
  record: AgentAnalysisRecord;
  escalation?: {
    event: EscalationEvent;
    outcome: PublishOutcome;
  };
};

export interface Recorder {
  /**
   * Validate, persist and (when triggers fire) escalate one analysis.
   * Resolves only once the record is durable.
   *
   * @throws ValidationError for invalid or identity-bearing input
   * @throws AcyclicityViolation for an invalid parent link
   * @throws StoreUnavailableError when the store stays down through every retry
   * @throws EscalationDeliveryError when the escalation could not be delivered
   */
  record(input: RecordInput): Promise<RecordResult>;
}

export type RecorderOptions = {
  processing: ProcessingStoreContext;
  rules: readonly CompiledEscalationRule[];
  publisher: EscalationPublisher;
  retry: RetrySettings;
  logger?: Logger;
  clock?: MonotonicClock;
  generateId?: () => string;
};

export function createRecorder(options: RecorderOptions): Recorder {
  const { processing, rules, publisher, retry } = options;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? createMonotonicClock();
  const generateId = options.generateId ?? randomUUID;

  function build(input: RecordInput): {
    record: AgentAnalysisRecord;
    severity: EscalationSeverity | null;
  } {
    const agentType = validateAgentType(input.agentType);
    const token = validateToken(input.token);
    const caseSession = validateCaseSession(input.caseSession);
    const status = validateStatus(input.status);
    const parentAnalysisId = validateParentId(input.parentAnalysisId);
    const inputSnapshot = validateSnapshot(input.inputSnapshot, 'inputSnapshot');
    const outputSnapshot = validateSnapshot(input.outputSnapshot, 'outputSnapshot');
    const confidenceScores = validateConfidenceScores(input.confidenceScores);
    const evidenceReferences = validateEvidence(input.evidenceReferences);

    assertNoIdentityLeaks({
      agentType,
      token,
      caseSession,
      status,
      parentAnalysisId,
      inputSnapshot,
      outputSnapshot,
      confidenceScores,
      evidenceReferences,
    });

    const createdAtMs = clock.now();
    const processingTimeMs =
      input.startedAt !== undefined && Number.isFinite(input.startedAt)
        ? Math.max(0, Math.round(createdAtMs - input.startedAt))
        : 0;

    const { triggers, severity } = evaluateEscalationRules(rules, {
      agentType,
      confidenceScores,
      outputSnapshot,
    });

    const record: AgentAnalysisRecord = {
      analysisId: generateId(),
      agentType,
      token,
      caseSession,
      status,
      inputSnapshot,
      outputSnapshot,
      confidenceScores,
      evidenceReferences,
      escalationTriggers: triggers,
      processingTimeMs,
      createdAt: new Date(createdAtMs).toISOString(),
    };
    if (parentAnalysisId !== undefined) {
      record.parentAnalysisId = parentAnalysisId;
    }
    return { record, severity };
  }

  return {
    async record(input) {
      const { record, severity } = build(input);
      const context = {
        analysisId: record.analysisId,
        agentType: record.agentType,
        token: record.token,
        caseSession: record.caseSession,
      };

      const stored = await withStoreRetry(
        'analyses.append',
        () => processing.analyses.append(record),
        retry,
        logger
      );
      logger.info('Analysis recorded', {
        ...context,
        parentAnalysisId: stored.parentAnalysisId,
        triggers: stored.escalationTriggers,
      });

      if (stored.escalationTriggers.length === 0 || severity === null) {
        return { analysisId: stored.analysisId, record: stored };
      }

      const event: EscalationEvent = {
        eventId: `esc_${stored.analysisId}`,
        analysisId: stored.analysisId,
        token: stored.token,
        caseSession: stored.caseSession,
        triggerReasons: [...stored.escalationTriggers],
        severity,
        createdAt: stored.createdAt,
      };
      const outcome = await publisher.publish(event);

      return { analysisId: stored.analysisId, record: stored, escalation: { event, outcome } };
    },
  };
}
