// Remote engine - delegates analysis to an HTTP service
//
// POST <url> with the request as JSON; the response body must be an
// AnalysisResult. Transport errors, timeouts and bad bodies all surface
// as EngineError.

import { z } from 'zod';
import type { JsonObject } from '@carechain/protocol';
import { EngineError } from '../errors.js';
import { describeError, silentLogger, type Logger } from '../logger.js';
import { isJsonObject } from '../recorder/validation.js';
import type { AnalysisEngine, AnalysisResult } from './types.js';

export type RemoteEngineOptions = {
  url: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

const jsonObjectSchema = z.custom<JsonObject>(isJsonObject, { message: 'must be a JSON object' });

const analysisResultSchema = z.object({
  status: z.enum(['completed', 'failed']).default('completed'),
  outputSnapshot: jsonObjectSchema,
  confidenceScores: z.record(z.number().min(0).max(1)).default({}),
  evidenceReferences: z.array(z.string().min(1)).default([]),
});

function createTimeoutController(timeoutMs: number): {
  controller: AbortController;
  clearTimeout: () => void;
} {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  return {
    controller,
    clearTimeout: () => clearTimeout(timeoutId),
  };
}

export function createRemoteEngine(options: RemoteEngineOptions): AnalysisEngine {
  const { url, timeoutMs } = options;
  const fetchImpl = options.fetch ?? fetch;
  const logger = options.logger ?? silentLogger;

  return {
    name: 'remote',

    async analyze(request): Promise<AnalysisResult> {
      const timeout = createTimeoutController(timeoutMs);
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'POST',
          headers: { 'content-type': 'application/json', accept: 'application/json' },
          body: JSON.stringify(request),
          signal: timeout.controller.signal,
        });
      } catch (error) {
        logger.error('Analysis engine request failed', {
          agentType: request.agentType,
          caseSession: request.caseSession,
          ...describeError(error),
        });
        const reason = timeout.controller.signal.aborted
          ? `timed out after ${timeoutMs}ms`
          : 'request failed';
        throw new EngineError(request.agentType, reason, error);
      } finally {
        timeout.clearTimeout();
      }

      if (!response.ok) {
        throw new EngineError(request.agentType, `HTTP ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new EngineError(request.agentType, 'response is not JSON', error);
      }

      const parsed = analysisResultSchema.safeParse(body);
      if (!parsed.success) {
        throw new EngineError(request.agentType, 'response does not match the result shape');
      }
      return parsed.data;
    },
  };
}
