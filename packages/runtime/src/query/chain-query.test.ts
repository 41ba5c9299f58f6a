import { describe, it, expect, beforeEach } from 'vitest';
import type { AgentAnalysisRecord } from '@carechain/protocol';
import {
  createInMemoryProcessingStore,
  type InMemoryProcessingStore,
} from '@carechain/repositories';
import { createChainQueryEngine, resolveWindow } from './chain-query.js';
import { summarizeOutput, topologicalOrder } from './ordering.js';
import { AnalysisNotFoundError, ValidationError } from '../errors.js';

const TOKEN = 'batman_ab12cd34';
const retry = { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => {} };

function rec(
  analysisId: string,
  createdAt: string,
  overrides: Partial<AgentAnalysisRecord> = {}
): AgentAnalysisRecord {
  return {
    analysisId,
    agentType: 'image_analysis',
    token: TOKEN,
    caseSession: 'case-001',
    status: 'completed',
    inputSnapshot: {},
    outputSnapshot: {},
    confidenceScores: {},
    evidenceReferences: [],
    escalationTriggers: [],
    processingTimeMs: 100,
    createdAt,
    ...overrides,
  };
}

describe('topologicalOrder', () => {
  it('puts parents before children and breaks ties by time then id', () => {
    const root = rec('r', '2026-03-01T10:00:00.000Z');
    const b = rec('b', '2026-03-01T10:00:02.000Z', { parentAnalysisId: 'r' });
    const a = rec('a', '2026-03-01T10:00:02.000Z', { parentAnalysisId: 'r' });
    const other = rec('z', '2026-03-01T10:00:01.000Z');
    const grandchild = rec('g', '2026-03-01T10:00:03.000Z', { parentAnalysisId: 'b' });

    expect(topologicalOrder([grandchild, b, other, a, root]).map((r) => r.analysisId)).toEqual([
      'r',
      'z',
      'a',
      'b',
      'g',
    ]);
  });

  it('treats a parent outside the set as a root', () => {
    const orphan = rec('o', '2026-03-01T10:00:00.000Z', { parentAnalysisId: 'elsewhere' });
    expect(topologicalOrder([orphan]).map((r) => r.analysisId)).toEqual(['o']);
  });
});

describe('summarizeOutput', () => {
  it('prefers well-known fields in order', () => {
    expect(summarizeOutput({ grade: 2, confidence: 0.85 })).toBe('confidence: 0.85');
    expect(summarizeOutput({ grade: 2, risk_level: 'high' })).toBe('risk_level: high');
  });

  it('falls back to the first field', () => {
    expect(summarizeOutput({ risk_percentage: 0.78, notes: ['a'] })).toBe('risk_percentage: 0.78');
    expect(summarizeOutput({ notes: ['a'] })).toBe('notes: ["a"]');
  });

  it('handles empty output', () => {
    expect(summarizeOutput({})).toBe('No output data');
  });
});

describe('resolveWindow', () => {
  const now = new Date('2026-03-02T00:00:00.000Z');

  it('defaults to the trailing 24 hours', () => {
    const { since, until } = resolveWindow({}, now);
    expect(since.toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(until.toISOString()).toBe('2026-03-02T00:00:00.000Z');
  });

  it('honours hours and absolute bounds', () => {
    expect(resolveWindow({ hours: 2 }, now).since.toISOString()).toBe('2026-03-01T22:00:00.000Z');
    expect(
      resolveWindow({ since: '2026-02-01T00:00:00.000Z', hours: 2 }, now).since.toISOString()
    ).toBe('2026-02-01T00:00:00.000Z');
  });

  it.each([{ hours: 0 }, { since: 'yesterday' }, { since: '2026-03-03T00:00:00.000Z' }])(
    'rejects %o',
    (window) => {
      expect(() => resolveWindow(window, now)).toThrow(ValidationError);
    }
  );
});

describe('ChainQueryEngine', () => {
  let store: InMemoryProcessingStore;
  const image = rec('an-1', '2026-03-01T10:00:00.000Z', {
    outputSnapshot: { grade: 2, confidence: 0.85 },
    confidenceScores: { overall: 0.75, lesion: 0.25 },
    evidenceReferences: ['img:1', 'img:2'],
  });
  const risk = rec('an-2', '2026-03-01T10:01:00.000Z', {
    agentType: 'risk_assessment',
    parentAnalysisId: 'an-1',
    outputSnapshot: { risk_percentage: 0.78, grade: 2 },
    confidenceScores: { overall: 0.9 },
    evidenceReferences: ['img:2', 'guideline:7'],
    escalationTriggers: ['high_risk_score_detected'],
  });
  const protocol = rec('an-3', '2026-03-01T10:04:00.000Z', {
    agentType: 'protocol',
    parentAnalysisId: 'an-2',
    outputSnapshot: { grade: 3, recommendation: 'reposition every 2h' },
    confidenceScores: { overall: 0.95 },
    evidenceReferences: ['guideline:7'],
  });

  function engine() {
    return createChainQueryEngine({
      processing: store,
      retry,
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    });
  }

  beforeEach(async () => {
    store = createInMemoryProcessingStore();
    await store.analyses.append(image);
    await store.analyses.append(risk);
    await store.analyses.append(protocol);
  });

  it('returns the chain in parent order with stored content unchanged', async () => {
    const chain = await engine().getChain('case-001');

    expect(chain).toEqual([image, risk, protocol]);
    expect(JSON.stringify(chain[0])).toBe(JSON.stringify(image));
  });

  it('returns an empty chain for an unknown session', async () => {
    await expect(engine().getChain('case-unknown')).resolves.toEqual([]);
  });

  it('traces the pathway of a record', async () => {
    const pathway = await engine().tracePathway('an-2');

    expect(pathway.target).toEqual(risk);
    expect(pathway.ancestors).toEqual([image]);
    expect(pathway.children).toEqual([protocol]);
    expect(pathway.totalAnalysesInCase).toBe(3);
    expect(pathway.confidenceEvolution.map((s) => s.averageConfidence)).toEqual([0.5, 0.9]);
    expect(pathway.evidenceAccumulation).toEqual([
      {
        analysisId: 'an-1',
        agentType: 'image_analysis',
        createdAt: '2026-03-01T10:00:00.000Z',
        newEvidence: ['img:1', 'img:2'],
        cumulativeEvidenceCount: 2,
      },
      {
        analysisId: 'an-2',
        agentType: 'risk_assessment',
        createdAt: '2026-03-01T10:01:00.000Z',
        newEvidence: ['guideline:7'],
        cumulativeEvidenceCount: 3,
      },
    ]);
    expect(pathway.decisionFlow).toEqual([
      'image_analysis: confidence: 0.85',
      '>>> risk_assessment: grade: 2 <<<',
      'protocol: recommendation: reposition every 2h',
    ]);
  });

  it('terminates on a parent cycle', async () => {
    const looped = createInMemoryProcessingStore();
    const x = rec('x', '2026-03-01T10:00:00.000Z', { parentAnalysisId: 'y' });
    const y = rec('y', '2026-03-01T10:00:01.000Z', { parentAnalysisId: 'x' });
    const fake = {
      analyses: {
        ...looped.analyses,
        get: async (id: string) => (id === 'x' ? x : id === 'y' ? y : null),
        getBySession: async () => [x, y],
      },
    };

    const pathway = await createChainQueryEngine({ processing: fake, retry }).tracePathway('x');

    expect(pathway.ancestors.map((r) => r.analysisId)).toEqual(['y']);
  });

  it('throws AnalysisNotFoundError for an unknown id', async () => {
    await expect(engine().tracePathway('an-404')).rejects.toBeInstanceOf(AnalysisNotFoundError);
  });

  it('correlates the agents of a case', async () => {
    const report = await engine().correlate('case-001');

    expect(report.agentTypes).toEqual(['image_analysis', 'risk_assessment', 'protocol']);
    expect(report.totalAnalyses).toBe(3);
    expect(report.evidenceOverlap['image_analysis|risk_assessment']).toBeCloseTo(100 / 3);
    expect(report.evidenceOverlap['image_analysis|protocol']).toBe(0);
    expect(report.evidenceOverlap['risk_assessment|protocol']).toBe(50);
    expect(report.decisionAgreement).toEqual({
      grade: {
        agreementRate: (1 - 1 / 3) * 100,
        uniqueValues: [2, 3],
        totalInstances: 3,
      },
    });
    expect(report.confidenceByAgent).toEqual({
      image_analysis: 0.5,
      risk_assessment: 0.9,
      protocol: 0.95,
    });
    expect(report.confidenceTrend).toBe('increasing');
    expect(report.recommendationConsistency).toEqual({
      totalRecommendations: 1,
      uniqueRecommendations: 1,
      consistencyScore: 1,
      commonRecommendations: ['reposition every 2h'],
    });
    expect(report.temporal).toEqual({
      totalDurationMs: 240_000,
      averageIntervalMs: 120_000,
      sequence: ['image_analysis', 'risk_assessment', 'protocol'],
      efficiency: 'efficient',
    });
  });

  it('reports insufficient data for a single scored record', async () => {
    const single = createInMemoryProcessingStore();
    await single.analyses.append(image);

    const report = await createChainQueryEngine({ processing: single, retry }).correlate('case-001');

    expect(report.confidenceTrend).toBe('insufficient_data');
    expect(report.evidenceOverlap).toEqual({});
    expect(report.recommendationConsistency).toEqual({
      totalRecommendations: 0,
      uniqueRecommendations: 0,
      consistencyScore: 1,
      commonRecommendations: [],
    });
    expect(report.temporal).toEqual({
      totalDurationMs: 0,
      averageIntervalMs: 0,
      sequence: ['image_analysis'],
      efficiency: 'insufficient_data',
    });
  });

  it('counts repeated recommendations and flags a slow case', async () => {
    await store.analyses.append(
      rec('rc-1', '2026-03-01T10:00:00.000Z', {
        caseSession: 'case-rec',
        outputSnapshot: { recommendations: ['reposition every 2h', 'pressure mattress', 3] },
      })
    );
    await store.analyses.append(
      rec('rc-2', '2026-03-01T10:10:00.000Z', {
        caseSession: 'case-rec',
        agentType: 'risk_assessment',
        outputSnapshot: { recommendation: 'reposition every 2h' },
      })
    );
    await store.analyses.append(
      rec('rc-3', '2026-03-01T10:20:00.000Z', {
        caseSession: 'case-rec',
        agentType: 'protocol',
        outputSnapshot: { recommendations: 'pressure mattress' },
      })
    );

    const report = await engine().correlate('case-rec');

    expect(report.recommendationConsistency).toEqual({
      totalRecommendations: 4,
      uniqueRecommendations: 2,
      consistencyScore: 0.5,
      commonRecommendations: ['reposition every 2h', 'pressure mattress'],
    });
    expect(report.temporal).toEqual({
      totalDurationMs: 1_200_000,
      averageIntervalMs: 600_000,
      sequence: ['image_analysis', 'risk_assessment', 'protocol'],
      efficiency: 'slow',
    });
  });

  it('aggregates agent performance over a window', async () => {
    await store.analyses.append(
      rec('an-4', '2026-03-01T11:00:00.000Z', {
        agentType: 'risk_assessment',
        caseSession: 'case-002',
        status: 'failed',
        processingTimeMs: 300,
        escalationTriggers: ['high_risk_score_detected', 'low_confidence_detected'],
      })
    );
    await store.analyses.append(
      rec('an-5', '2026-02-20T11:00:00.000Z', { agentType: 'risk_assessment', caseSession: 'case-003' })
    );

    const report = await engine().agentPerformance('risk_assessment', { hours: 24 });

    expect(report).toEqual({
      agentType: 'risk_assessment',
      window: { since: '2026-02-28T12:00:00.000Z', until: '2026-03-01T12:00:00.000Z' },
      totalAnalyses: 2,
      successRate: 50,
      failureRate: 50,
      escalationRate: 100,
      averageLatencyMs: 200,
      averageConfidence: 0.9,
      commonEscalationTriggers: [
        { trigger: 'high_risk_score_detected', count: 2 },
        { trigger: 'low_confidence_detected', count: 1 },
      ],
      dailyAverage: 2,
      performanceTrend: 'insufficient_data',
    });
  });

  it.each([
    ['improving', ['failed', 'failed', 'completed', 'completed', 'completed', 'completed']],
    ['declining', ['completed', 'completed', 'completed', 'completed', 'failed', 'failed']],
    ['stable', ['completed', 'failed', 'completed', 'failed', 'completed', 'completed']],
    ['insufficient_data', ['completed', 'failed', 'failed', 'failed']],
  ] as const)('reports a %s performance trend', async (trend, statuses) => {
    const trendStore = createInMemoryProcessingStore();
    for (let index = 0; index < statuses.length; index++) {
      await trendStore.analyses.append(
        rec(`t-${index}`, `2026-03-01T0${index + 1}:00:00.000Z`, {
          agentType: 'risk_assessment',
          caseSession: 'case-trend',
          status: statuses[index],
        })
      );
    }

    const report = await createChainQueryEngine({
      processing: trendStore,
      retry,
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    }).agentPerformance('risk_assessment', { hours: 48 });

    expect(report.performanceTrend).toBe(trend);
    expect(report.dailyAverage).toBe(statuses.length / 2);
  });

  it('returns zeros for an agent with no records', async () => {
    const report = await engine().agentPerformance('voice_analysis');

    expect(report.totalAnalyses).toBe(0);
    expect(report.successRate).toBe(0);
    expect(report.commonEscalationTriggers).toEqual([]);
    expect(report.dailyAverage).toBe(0);
    expect(report.performanceTrend).toBe('insufficient_data');
  });

  it('lists sessions for a token', async () => {
    await store.analyses.append(rec('an-6', '2026-03-01T11:30:00.000Z', { caseSession: 'case-009' }));

    await expect(engine().getSessionsForToken(TOKEN)).resolves.toEqual(['case-001', 'case-009']);
  });

  it('rejects malformed addresses', async () => {
    await expect(engine().getSessionsForToken('Bruce Wayne')).rejects.toMatchObject({
      reason: 'invalid_token',
    });
    await expect(engine().getChain('bad session!')).rejects.toMatchObject({
      reason: 'invalid_case_session',
    });
  });
});
