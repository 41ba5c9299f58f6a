import type {
  AgentType,
  AnalysisStatus,
  ConfidenceScores,
  Id,
  JsonObject,
  Token,
} from '@carechain/protocol';

/**
 * Upstream result an agent builds on. Only the fields an engine needs;
 * never the full record.
 */
export type UpstreamAnalysis = {
  analysisId: Id;
  agentType: AgentType;
  outputSnapshot: JsonObject;
  confidenceScores: ConfidenceScores;
};

export type AnalysisRequest = {
  agentType: AgentType;
  token: Token;
  caseSession: string;
  input: JsonObject;
  upstream: UpstreamAnalysis[];
};

export type AnalysisResult = {
  status: AnalysisStatus;
  outputSnapshot: JsonObject;
  confidenceScores: ConfidenceScores;
  evidenceReferences: string[];
};

/**
 * The analysis capability behind every agent. Implementations are
 * interchangeable; callers never branch on which one is active.
 */
export interface AnalysisEngine {
  readonly name: string;

  /** @throws EngineError */
  analyze(request: AnalysisRequest): Promise<AnalysisResult>;
}
