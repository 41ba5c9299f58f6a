// Agent contract: analyze, then record. An agent's result exists only once
// `record` has succeeded.

import type { AgentAnalysisRecord, AgentType, Id, JsonObject, Token } from '@carechain/protocol';
import { EngineError } from '../errors.js';
import type { Recorder, RecordResult } from '../recorder/recorder.js';
import type { AnalysisEngine } from './types.js';

export type AgentTask = {
  agentType: AgentType;
  token: Token;
  caseSession: string;
  input: JsonObject;
  /** Earlier records of the same case this agent builds on */
  upstream?: AgentAnalysisRecord[];
  /** Defaults to the last upstream record */
  parentAnalysisId?: Id;
};

export type RunAgentOptions = {
  /** Clock milliseconds, for processing time */
  now?: () => number;
};

/**
 * Run one agent step.
 *
 * An engine failure is recorded as a failed analysis, so the chain shows
 * that the step was attempted. Recorder errors propagate.
 */
export async function runAgent(
  engine: AnalysisEngine,
  recorder: Recorder,
  task: AgentTask,
  options: RunAgentOptions = {}
): Promise<RecordResult> {
  const now = options.now ?? Date.now;
  const upstream = task.upstream ?? [];
  const parentAnalysisId = task.parentAnalysisId ?? upstream.at(-1)?.analysisId;
  const startedAt = now();

  const base = {
    agentType: task.agentType,
    token: task.token,
    caseSession: task.caseSession,
    inputSnapshot: task.input,
    parentAnalysisId,
    startedAt,
  };

  try {
    const result = await engine.analyze({
      agentType: task.agentType,
      token: task.token,
      caseSession: task.caseSession,
      input: task.input,
      upstream: upstream.map((record) => ({
        analysisId: record.analysisId,
        agentType: record.agentType,
        outputSnapshot: record.outputSnapshot,
        confidenceScores: record.confidenceScores,
      })),
    });

    return await recorder.record({
      ...base,
      status: result.status,
      outputSnapshot: result.outputSnapshot,
      confidenceScores: result.confidenceScores,
      evidenceReferences: result.evidenceReferences,
    });
  } catch (error) {
    if (!(error instanceof EngineError)) throw error;

    return recorder.record({
      ...base,
      status: 'failed',
      outputSnapshot: { error: error.code, engine: engine.name },
      confidenceScores: {},
      evidenceReferences: [],
    });
  }
}
