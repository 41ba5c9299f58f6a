// Agent analysis types - the append-only decision ledger

import type { Id, JsonObject, Timestamp, Token } from './common.js';

/**
 * Agent types known to the pipeline. Other lowercase snake_case
 * names are accepted so new agents can be added without a release.
 */
export const KNOWN_AGENT_TYPES = [
  'image_analysis',
  'clinical_assessment',
  'protocol',
  'communication',
  'workflow',
  'risk_assessment',
  'monai_review',
  'diagnostic',
  'voice_analysis',
] as const;

export type KnownAgentType = (typeof KNOWN_AGENT_TYPES)[number];

export type AgentType = KnownAgentType | (string & {});

export type AnalysisStatus = 'completed' | 'failed';

/**
 * Metric name -> value in [0, 1].
 */
export type ConfidenceScores = Record<string, number>;

/**
 * One agent invocation, immutable once written.
 */
export type AgentAnalysisRecord = {
  analysisId: Id;
  agentType: AgentType;
  token: Token;
  caseSession: string;
  status: AnalysisStatus;
  inputSnapshot: JsonObject;
  outputSnapshot: JsonObject;
  confidenceScores: ConfidenceScores;
  evidenceReferences: string[];
  escalationTriggers: string[];
  parentAnalysisId?: Id;
  processingTimeMs: number;
  createdAt: Timestamp;
};

/**
 * Filter for reading records from the processing store.
 */
export type AnalysisFilter = {
  caseSession?: string;
  token?: Token;
  agentType?: AgentType;
  timeRange?: {
    start?: Timestamp;
    end?: Timestamp;
  };
  limit?: number;
  offset?: number;
};
