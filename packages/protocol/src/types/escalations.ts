// Escalation types

import type { Id, Timestamp, Token } from './common.js';
import type { AgentType } from './analyses.js';

export type EscalationSeverity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITY_ORDER: Record<EscalationSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

/**
 * Published once per record whose escalation triggers fired.
 * Delivery is at-least-once; consumers deduplicate by `analysisId`.
 */
export type EscalationEvent = {
  eventId: Id;
  analysisId: Id;
  token: Token;
  caseSession: string;
  triggerReasons: string[];
  severity: EscalationSeverity;
  createdAt: Timestamp;
};

/**
 * Where an escalation rule reads its value from.
 * - confidence: a named confidence score (or the minimum of all scores)
 * - output: a top-level numeric field of the output snapshot
 */
export type EscalationRuleSource = 'confidence' | 'output';

/**
 * Declarative trigger rule, supplied as deployment configuration.
 */
export type EscalationRule = {
  /** Trigger name attached to the record when the rule fires */
  name: string;
  kind: 'confidence_below' | 'metric_above' | 'metric_below';
  source: EscalationRuleSource;

  /** Field or score name; omitted for "any confidence score" */
  metric?: string;

  threshold: number;
  severity: EscalationSeverity;

  /** Restrict to these agent types; all agents when omitted */
  agentTypes?: AgentType[];
};
