import { silentLogger, type Logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';
import type { Config } from '../config.js';
import { createDeterministicEngine } from './deterministic.js';
import { createRemoteEngine } from './remote.js';
import type { AnalysisEngine } from './types.js';

export type {
  AnalysisEngine,
  AnalysisRequest,
  AnalysisResult,
  UpstreamAnalysis,
} from './types.js';
export { createDeterministicEngine } from './deterministic.js';
export { createRemoteEngine, type RemoteEngineOptions } from './remote.js';
export { runAgent, type AgentTask, type RunAgentOptions } from './run-agent.js';

/**
 * Pick the engine named by ENGINE_MODE.
 */
export function createEngineFromConfig(
  engine: Config['engine'],
  deps: { fetch?: typeof fetch; logger?: Logger } = {}
): AnalysisEngine {
  if (engine.mode === 'remote') {
    if (!engine.url) {
      throw new ConfigurationError(['engine.url: required when ENGINE_MODE=remote']);
    }
    return createRemoteEngine({
      url: engine.url,
      timeoutMs: engine.timeoutMs,
      fetch: deps.fetch,
      logger: deps.logger ?? silentLogger,
    });
  }
  return createDeterministicEngine();
}
