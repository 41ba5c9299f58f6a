// Read-model types produced by the chain query engine

import type { Id, Timestamp } from './common.js';
import type { AgentAnalysisRecord, AgentType, ConfidenceScores } from './analyses.js';

export type ConfidenceStep = {
  analysisId: Id;
  agentType: AgentType;
  createdAt: Timestamp;
  confidenceScores: ConfidenceScores;
  /** Mean of the step's scores, null when it has none */
  averageConfidence: number | null;
};

export type EvidenceStep = {
  analysisId: Id;
  agentType: AgentType;
  createdAt: Timestamp;
  newEvidence: string[];
  cumulativeEvidenceCount: number;
};

/**
 * How a decision was reached: the ancestor chain of one record.
 */
export type DecisionPathway = {
  target: AgentAnalysisRecord;

  /** Root first, direct parent last */
  ancestors: AgentAnalysisRecord[];

  /** Records whose parent is the target */
  children: AgentAnalysisRecord[];

  caseSession: string;
  totalAnalysesInCase: number;

  /** Root to target */
  confidenceEvolution: ConfidenceStep[];

  /** Root to target */
  evidenceAccumulation: EvidenceStep[];

  /** One summary line per step, target marked with >>> <<< */
  decisionFlow: string[];
};

export type FieldAgreement = {
  /** Percentage in [0, 100] */
  agreementRate: number;
  uniqueValues: unknown[];
  totalInstances: number;
};

export type ConfidenceTrend = 'increasing' | 'decreasing' | 'stable' | 'insufficient_data';

export type PerformanceTrend = 'improving' | 'declining' | 'stable' | 'insufficient_data';

/** Under five minutes between consecutive analyses on average is efficient */
export type TemporalEfficiency = 'efficient' | 'slow' | 'insufficient_data';

export type RecommendationConsistency = {
  totalRecommendations: number;
  uniqueRecommendations: number;
  /** Distinct over total recommendations, in (0, 1]; 1 when there are none */
  consistencyScore: number;
  /** Distinct recommendations in order of first appearance, at most ten */
  commonRecommendations: string[];
};

export type CorrelationReport = {
  caseSession: string;
  agentTypes: AgentType[];
  totalAnalyses: number;

  /** "agentA|agentB" -> Jaccard overlap of cited evidence, in percent */
  evidenceOverlap: Record<string, number>;

  /** Output field -> agreement across agents */
  decisionAgreement: Record<string, FieldAgreement>;

  /** Agent type -> mean of per-record average confidence */
  confidenceByAgent: Record<string, number>;

  confidenceTrend: ConfidenceTrend;

  /** Over the "recommendations" and "recommendation" output fields */
  recommendationConsistency: RecommendationConsistency;

  temporal: {
    totalDurationMs: number;
    averageIntervalMs: number;
    sequence: AgentType[];
    efficiency: TemporalEfficiency;
  };
};

export type AgentPerformanceReport = {
  agentType: AgentType;
  window: {
    since: Timestamp;
    until: Timestamp;
  };
  totalAnalyses: number;

  /** Percentages in [0, 100] */
  successRate: number;
  failureRate: number;
  escalationRate: number;

  averageLatencyMs: number;
  averageConfidence: number;

  /** Most frequent triggers, at most five, most frequent first */
  commonEscalationTriggers: Array<{ trigger: string; count: number }>;

  /** Analyses per 24 hours of the window */
  dailyAverage: number;

  /** Success rate of the later half of the window against the earlier half */
  performanceTrend: PerformanceTrend;
};
