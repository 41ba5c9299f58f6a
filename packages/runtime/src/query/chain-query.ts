// Chain query engine - read-only views over the processing store
//
// Everything here is addressed by case session, analysis id, agent type or
// token. Nothing reads or returns identity.

import type {
  AgentAnalysisRecord,
  AgentPerformanceReport,
  AgentType,
  ConfidenceStep,
  ConfidenceTrend,
  CorrelationReport,
  DecisionPathway,
  EvidenceStep,
  FieldAgreement,
  Id,
  PerformanceTrend,
  RecommendationConsistency,
  TemporalEfficiency,
  TimeWindow,
  Token,
} from '@carechain/protocol';
import type { ProcessingStoreContext } from '@carechain/repositories';
import { AnalysisNotFoundError, ValidationError } from '../errors.js';
import { canonicalJsonStringify } from '../hash.js';
import { silentLogger, type Logger } from '../logger.js';
import { validateAgentType, validateCaseSession, validateToken } from '../recorder/validation.js';
import type { RetrySettings } from '../retry.js';
import { withStoreRetry } from '../store-retry.js';
import { averageConfidence, mean, summarizeOutput, topologicalOrder } from './ordering.js';

export const DEFAULT_WINDOW_HOURS = 24;

/** Minimum change between halves for a confidence or performance trend */
const TREND_THRESHOLD = 0.05;

/** Fewest records in a window before a performance trend is reported */
const PERFORMANCE_TREND_MIN_RECORDS = 5;

/** Mean gap between consecutive analyses below which a case is efficient */
export const EFFICIENT_INTERVAL_MS = 5 * 60 * 1000;

const MAX_COMMON_RECOMMENDATIONS = 10;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface ChainQueryEngine {
  /** Records of a case session, parents before children */
  getChain(caseSession: string): Promise<AgentAnalysisRecord[]>;

  /** @throws AnalysisNotFoundError */
  getAnalysis(analysisId: Id): Promise<AgentAnalysisRecord>;

  /** @throws AnalysisNotFoundError */
  tracePathway(analysisId: Id): Promise<DecisionPathway>;

  correlate(caseSession: string): Promise<CorrelationReport>;

  agentPerformance(agentType: AgentType, window?: TimeWindow): Promise<AgentPerformanceReport>;

  getSessionsForToken(token: Token): Promise<string[]>;
}

export type ChainQueryOptions = {
  processing: ProcessingStoreContext;
  retry: RetrySettings;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Resolve a time window to absolute bounds.
 * `since`/`until` win over `hours`; the default is the trailing 24 hours.
 */
export function resolveWindow(window: TimeWindow, now: Date): { since: Date; until: Date } {
  const until = window.until !== undefined ? new Date(window.until) : now;
  if (Number.isNaN(until.getTime())) {
    throw new ValidationError('invalid_window', { field: 'window.until' });
  }

  let since: Date;
  if (window.since !== undefined) {
    since = new Date(window.since);
    if (Number.isNaN(since.getTime())) {
      throw new ValidationError('invalid_window', { field: 'window.since' });
    }
  } else {
    const hours = window.hours ?? DEFAULT_WINDOW_HOURS;
    if (!Number.isFinite(hours) || hours <= 0) {
      throw new ValidationError('invalid_window', { field: 'window.hours' });
    }
    since = new Date(until.getTime() - hours * HOUR_MS);
  }

  if (since.getTime() > until.getTime()) {
    throw new ValidationError('invalid_window', { field: 'window' });
  }
  return { since, until };
}

function confidenceStep(record: AgentAnalysisRecord): ConfidenceStep {
  return {
    analysisId: record.analysisId,
    agentType: record.agentType,
    createdAt: record.createdAt,
    confidenceScores: { ...record.confidenceScores },
    averageConfidence: averageConfidence(record),
  };
}

function evidenceSteps(steps: readonly AgentAnalysisRecord[]): EvidenceStep[] {
  const seen = new Set<string>();
  return steps.map((record) => {
    const newEvidence = record.evidenceReferences.filter((ref) => {
      if (seen.has(ref)) return false;
      seen.add(ref);
      return true;
    });
    return {
      analysisId: record.analysisId,
      agentType: record.agentType,
      createdAt: record.createdAt,
      newEvidence,
      cumulativeEvidenceCount: seen.size,
    };
  });
}

function groupByAgent(records: readonly AgentAnalysisRecord[]): Map<string, AgentAnalysisRecord[]> {
  const groups = new Map<string, AgentAnalysisRecord[]>();
  for (const record of records) {
    const group = groups.get(record.agentType) ?? [];
    group.push(record);
    groups.set(record.agentType, group);
  }
  return groups;
}

function evidenceOverlap(groups: Map<string, AgentAnalysisRecord[]>): Record<string, number> {
  const evidence = [...groups].map(
    ([agentType, records]) =>
      [agentType, new Set(records.flatMap((r) => r.evidenceReferences))] as const
  );

  const overlap: Record<string, number> = {};
  for (let i = 0; i < evidence.length; i++) {
    for (let j = i + 1; j < evidence.length; j++) {
      const [agentA, setA] = evidence[i];
      const [agentB, setB] = evidence[j];
      if (setA.size === 0 || setB.size === 0) continue;

      const shared = [...setA].filter((ref) => setB.has(ref)).length;
      const union = new Set([...setA, ...setB]).size;
      overlap[`${agentA}|${agentB}`] = (shared / union) * 100;
    }
  }
  return overlap;
}

/**
 * Agreement per output field reported by at least two agent types.
 */
function decisionAgreement(records: readonly AgentAnalysisRecord[]): Record<string, FieldAgreement> {
  const fields = new Map<string, { agents: Set<string>; values: unknown[] }>();
  for (const record of records) {
    for (const [field, value] of Object.entries(record.outputSnapshot)) {
      const entry = fields.get(field) ?? { agents: new Set<string>(), values: [] };
      entry.agents.add(record.agentType);
      entry.values.push(value);
      fields.set(field, entry);
    }
  }

  const agreement: Record<string, FieldAgreement> = {};
  for (const [field, { agents, values }] of fields) {
    if (agents.size < 2) continue;

    const unique = new Map<string, unknown>();
    for (const value of values) {
      const key = canonicalJsonStringify(value);
      if (!unique.has(key)) unique.set(key, value);
    }
    agreement[field] = {
      agreementRate: (1 - (unique.size - 1) / values.length) * 100,
      uniqueValues: [...unique.values()],
      totalInstances: values.length,
    };
  }
  return agreement;
}

/**
 * Compare mean confidence of the first and second half of the chain.
 */
function confidenceTrend(chain: readonly AgentAnalysisRecord[]): ConfidenceTrend {
  const points = chain.flatMap((record) => {
    const value = averageConfidence(record);
    return value === null ? [] : [value];
  });
  if (points.length < 2) return 'insufficient_data';

  const middle = Math.floor(points.length / 2);
  const first = mean(points.slice(0, middle)) ?? 0;
  const second = mean(points.slice(middle)) ?? 0;

  if (second > first + TREND_THRESHOLD) return 'increasing';
  if (second < first - TREND_THRESHOLD) return 'decreasing';
  return 'stable';
}

/**
 * Compare the success rate of the earlier and later half of a window.
 */
function performanceTrend(records: readonly AgentAnalysisRecord[]): PerformanceTrend {
  if (records.length < PERFORMANCE_TREND_MIN_RECORDS) return 'insufficient_data';

  const ordered = [...records].sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
  const middle = Math.floor(ordered.length / 2);
  const successRate = (slice: readonly AgentAnalysisRecord[]) =>
    slice.filter((r) => r.status === 'completed').length / slice.length;
  const first = successRate(ordered.slice(0, middle));
  const second = successRate(ordered.slice(middle));

  if (second > first + TREND_THRESHOLD) return 'improving';
  if (second < first - TREND_THRESHOLD) return 'declining';
  return 'stable';
}

function recommendationsOf(record: AgentAnalysisRecord): string[] {
  const found: string[] = [];
  for (const field of ['recommendations', 'recommendation']) {
    const value = record.outputSnapshot[field];
    if (typeof value === 'string') {
      found.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'string') found.push(item);
      }
    }
  }
  return found;
}

function recommendationConsistency(
  records: readonly AgentAnalysisRecord[]
): RecommendationConsistency {
  const all = records.flatMap(recommendationsOf);
  const unique = [...new Set(all)];
  return {
    totalRecommendations: all.length,
    uniqueRecommendations: unique.length,
    consistencyScore: all.length === 0 ? 1 : unique.length / all.length,
    commonRecommendations: unique.slice(0, MAX_COMMON_RECOMMENDATIONS),
  };
}

function temporalEfficiency(count: number, averageIntervalMs: number): TemporalEfficiency {
  if (count < 2) return 'insufficient_data';
  return averageIntervalMs < EFFICIENT_INTERVAL_MS ? 'efficient' : 'slow';
}

function percent(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}

export function createChainQueryEngine(options: ChainQueryOptions): ChainQueryEngine {
  const { processing, retry } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const read = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
    withStoreRetry(operation, fn, retry, logger);

  async function getChain(caseSession: string): Promise<AgentAnalysisRecord[]> {
    const session = validateCaseSession(caseSession);
    const records = await read('analyses.getBySession', () =>
      processing.analyses.getBySession(session)
    );
    return topologicalOrder(records);
  }

  async function getAnalysis(analysisId: Id): Promise<AgentAnalysisRecord> {
    if (typeof analysisId !== 'string' || analysisId.trim() === '') {
      throw new ValidationError('malformed_message', { field: 'analysisId' });
    }
    const record = await read('analyses.get', () => processing.analyses.get(analysisId));
    if (!record) {
      throw new AnalysisNotFoundError(analysisId);
    }
    return record;
  }

  return {
    getChain,
    getAnalysis,

    async tracePathway(analysisId) {
      const target = await getAnalysis(analysisId);

      const sessionRecords = await read('analyses.getBySession', () =>
        processing.analyses.getBySession(target.caseSession)
      );
      const byId = new Map(sessionRecords.map((record) => [record.analysisId, record]));

      const ancestors: AgentAnalysisRecord[] = [];
      const visited = new Set<string>([target.analysisId]);
      let parentId = target.parentAnalysisId;
      while (parentId !== undefined && !visited.has(parentId)) {
        visited.add(parentId);
        const parent = byId.get(parentId);
        if (!parent) break;
        ancestors.unshift(parent);
        parentId = parent.parentAnalysisId;
      }

      const children = sessionRecords.filter(
        (record) => record.parentAnalysisId === target.analysisId
      );
      const steps = [...ancestors, target];

      return {
        target,
        ancestors,
        children,
        caseSession: target.caseSession,
        totalAnalysesInCase: sessionRecords.length,
        confidenceEvolution: steps.map(confidenceStep),
        evidenceAccumulation: evidenceSteps(steps),
        decisionFlow: [
          ...ancestors.map((r) => `${r.agentType}: ${summarizeOutput(r.outputSnapshot)}`),
          `>>> ${target.agentType}: ${summarizeOutput(target.outputSnapshot)} <<<`,
          ...children.map((r) => `${r.agentType}: ${summarizeOutput(r.outputSnapshot)}`),
        ],
      };
    },

    async correlate(caseSession) {
      const chain = await getChain(caseSession);
      const groups = groupByAgent(chain);

      const confidenceByAgent: Record<string, number> = {};
      for (const [agentType, records] of groups) {
        const value = mean(
          records.flatMap((record) => {
            const average = averageConfidence(record);
            return average === null ? [] : [average];
          })
        );
        if (value !== null) confidenceByAgent[agentType] = value;
      }

      const timeline = [...chain].sort(
        (a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt)
      );
      const totalDurationMs =
        timeline.length > 1
          ? Date.parse(timeline[timeline.length - 1].createdAt) - Date.parse(timeline[0].createdAt)
          : 0;
      const averageIntervalMs = timeline.length > 1 ? totalDurationMs / (timeline.length - 1) : 0;

      return {
        caseSession,
        agentTypes: [...groups.keys()],
        totalAnalyses: chain.length,
        evidenceOverlap: evidenceOverlap(groups),
        decisionAgreement: decisionAgreement(chain),
        confidenceByAgent,
        confidenceTrend: confidenceTrend(chain),
        recommendationConsistency: recommendationConsistency(chain),
        temporal: {
          totalDurationMs,
          averageIntervalMs,
          sequence: timeline.map((record) => record.agentType),
          efficiency: temporalEfficiency(timeline.length, averageIntervalMs),
        },
      };
    },

    async agentPerformance(agentType, window = {}) {
      const type = validateAgentType(agentType);
      const { since, until } = resolveWindow(window, now());

      const records = await read('analyses.query', () =>
        processing.analyses.query({
          agentType: type,
          timeRange: { start: since.toISOString(), end: until.toISOString() },
        })
      );

      const total = records.length;
      const completed = records.filter((r) => r.status === 'completed').length;
      const escalated = records.filter((r) => r.escalationTriggers.length > 0).length;

      const triggerCounts = new Map<string, number>();
      for (const record of records) {
        for (const trigger of record.escalationTriggers) {
          triggerCounts.set(trigger, (triggerCounts.get(trigger) ?? 0) + 1);
        }
      }

      const confidences = records.flatMap((record) => {
        const value = averageConfidence(record);
        return value === null ? [] : [value];
      });
      const windowDays = (until.getTime() - since.getTime()) / DAY_MS;

      return {
        agentType: type,
        window: { since: since.toISOString(), until: until.toISOString() },
        totalAnalyses: total,
        successRate: percent(completed, total),
        failureRate: percent(total - completed, total),
        escalationRate: percent(escalated, total),
        averageLatencyMs: mean(records.map((r) => r.processingTimeMs)) ?? 0,
        averageConfidence: mean(confidences) ?? 0,
        commonEscalationTriggers: [...triggerCounts]
          .sort(([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0))
          .slice(0, 5)
          .map(([trigger, count]) => ({ trigger, count })),
        dailyAverage: windowDays > 0 ? total / windowDays : 0,
        performanceTrend: performanceTrend(records),
      };
    },

    async getSessionsForToken(token) {
      const valid = validateToken(token);
      return read('analyses.listSessionsForToken', () =>
        processing.analyses.listSessionsForToken(valid)
      );
    },
  };
}
