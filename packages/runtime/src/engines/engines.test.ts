import { describe, it, expect } from 'vitest';
import { createInMemoryProcessingStore } from '@carechain/repositories';
import { createEngineFromConfig, createDeterministicEngine, createRemoteEngine, runAgent } from './index.js';
import type { AnalysisEngine, AnalysisRequest } from './types.js';
import { loadConfig } from '../config.js';
import { ConfigurationError, EngineError } from '../errors.js';
import { EscalationBus } from '../escalation/bus.js';
import { createEscalationPublisher } from '../escalation/publisher.js';
import { compileEscalationRules } from '../escalation/rules.js';
import { createMonotonicClock } from '../recorder/clock.js';
import { createRecorder } from '../recorder/recorder.js';

const TOKEN = 'batman_ab12cd34';
const retry = { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => {} };

const request: AnalysisRequest = {
  agentType: 'risk_assessment',
  token: TOKEN,
  caseSession: 'case-001',
  input: { braden_score: 12 },
  upstream: [],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('createDeterministicEngine', () => {
  it('returns the same result for the same request', async () => {
    const engine = createDeterministicEngine();

    const a = await engine.analyze(request);
    const b = await engine.analyze({ ...request, input: { braden_score: 12 } });

    expect(a).toEqual(b);
    expect(a.status).toBe('completed');
  });

  it('shapes output by agent type within range', async () => {
    const engine = createDeterministicEngine();

    const risk = await engine.analyze(request);
    const image = await engine.analyze({ ...request, agentType: 'image_analysis' });

    expect(typeof risk.outputSnapshot.risk_percentage).toBe('number');
    expect(['low', 'medium', 'high', 'critical']).toContain(risk.outputSnapshot.risk_level);
    expect([0, 1, 2, 3, 4]).toContain(image.outputSnapshot.grade);
    expect(image.confidenceScores.overall).toBeGreaterThanOrEqual(0.5);
    expect(image.confidenceScores.overall).toBeLessThanOrEqual(1);
  });

  it('cites upstream analyses as evidence', async () => {
    const engine = createDeterministicEngine();

    const result = await engine.analyze({
      ...request,
      upstream: [
        { analysisId: 'an-1', agentType: 'image_analysis', outputSnapshot: {}, confidenceScores: {} },
      ],
    });

    expect(result.evidenceReferences).toHaveLength(2);
    expect(result.evidenceReferences[1]).toBe('analysis:an-1');
  });
});

describe('createRemoteEngine', () => {
  it('posts the request and validates the response', async () => {
    const calls: Array<{ url: string; body: unknown }> = [];
    const engine = createRemoteEngine({
      url: 'http://engine.test/analyze',
      timeoutMs: 1000,
      fetch: async (input, init) => {
        calls.push({ url: String(input), body: JSON.parse(String(init?.body)) });
        return jsonResponse({
          outputSnapshot: { risk_percentage: 0.78 },
          confidenceScores: { overall: 0.82 },
        });
      },
    });

    const result = await engine.analyze(request);

    expect(calls).toEqual([{ url: 'http://engine.test/analyze', body: request }]);
    expect(result).toEqual({
      status: 'completed',
      outputSnapshot: { risk_percentage: 0.78 },
      confidenceScores: { overall: 0.82 },
      evidenceReferences: [],
    });
  });

  it('rejects a non-2xx response', async () => {
    const engine = createRemoteEngine({
      url: 'http://engine.test/analyze',
      timeoutMs: 1000,
      fetch: async () => jsonResponse({ error: 'boom' }, 503),
    });

    await expect(engine.analyze(request)).rejects.toThrow(
      'Analysis engine failed for risk_assessment: HTTP 503'
    );
  });

  it('rejects a response of the wrong shape', async () => {
    const engine = createRemoteEngine({
      url: 'http://engine.test/analyze',
      timeoutMs: 1000,
      fetch: async () => jsonResponse({ outputSnapshot: [1, 2] }),
    });

    await expect(engine.analyze(request)).rejects.toBeInstanceOf(EngineError);
  });

  it('times out', async () => {
    const engine = createRemoteEngine({
      url: 'http://engine.test/analyze',
      timeoutMs: 5,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    await expect(engine.analyze(request)).rejects.toThrow('timed out after 5ms');
  });
});

describe('createEngineFromConfig', () => {
  it('defaults to the deterministic engine', () => {
    const config = loadConfig({});
    expect(createEngineFromConfig(config.engine).name).toBe('deterministic');
  });

  it('builds the remote engine when configured', () => {
    const config = loadConfig({ ENGINE_MODE: 'remote', ENGINE_URL: 'http://engine.test/analyze' });
    expect(createEngineFromConfig(config.engine).name).toBe('remote');
  });

  it('refuses remote mode without a url', () => {
    expect(() =>
      createEngineFromConfig({ mode: 'remote', timeoutMs: 1000 })
    ).toThrow(ConfigurationError);
  });
});

describe('runAgent', () => {
  function setup() {
    const store = createInMemoryProcessingStore();
    const recorder = createRecorder({
      processing: store,
      rules: compileEscalationRules([]),
      publisher: createEscalationPublisher({
        sink: new EscalationBus(),
        fallback: { append: async () => {} },
        retry,
      }),
      retry,
      clock: createMonotonicClock(() => 10_000),
    });
    return { store, recorder };
  }

  it('records the engine result linked to the last upstream record', async () => {
    const { recorder } = setup();
    const engine: AnalysisEngine = {
      name: 'scripted',
      analyze: async (req) => ({
        status: 'completed',
        outputSnapshot: { seen: req.upstream.length },
        confidenceScores: { overall: 0.9 },
        evidenceReferences: ['ref:1'],
      }),
    };

    const first = await runAgent(engine, recorder, {
      agentType: 'image_analysis',
      token: TOKEN,
      caseSession: 'case-001',
      input: {},
    }, { now: () => 9_900 });
    const second = await runAgent(engine, recorder, {
      agentType: 'risk_assessment',
      token: TOKEN,
      caseSession: 'case-001',
      input: {},
      upstream: [first.record],
    }, { now: () => 10_000 });

    expect(first.record.processingTimeMs).toBe(100);
    expect(first.record.parentAnalysisId).toBeUndefined();
    expect(second.record.parentAnalysisId).toBe(first.analysisId);
    expect(second.record.outputSnapshot).toEqual({ seen: 1 });
  });

  it('records an engine failure as a failed analysis', async () => {
    const { store, recorder } = setup();
    const engine: AnalysisEngine = {
      name: 'broken',
      analyze: async (req) => {
        throw new EngineError(req.agentType, 'HTTP 500');
      },
    };

    const result = await runAgent(engine, recorder, {
      agentType: 'protocol',
      token: TOKEN,
      caseSession: 'case-001',
      input: {},
    });

    expect(result.record.status).toBe('failed');
    expect(result.record.outputSnapshot).toEqual({ error: 'ENGINE_ERROR', engine: 'broken' });
    expect(store._data.analyses.size).toBe(1);
  });

  it('propagates other errors without recording', async () => {
    const { store, recorder } = setup();
    const engine: AnalysisEngine = {
      name: 'buggy',
      analyze: async () => {
        throw new TypeError('bug');
      },
    };

    await expect(
      runAgent(engine, recorder, { agentType: 'protocol', token: TOKEN, caseSession: 'case-001', input: {} })
    ).rejects.toBeInstanceOf(TypeError);
    expect(store._data.analyses.size).toBe(0);
  });
});
