export {
  compileEscalationRule,
  compileEscalationRules,
  defineEscalationRule,
  evaluateEscalationRules,
  readOutputMetric,
  type CompiledEscalationRule,
  type EscalationEvaluation,
  type EscalationPredicate,
  type EscalationSubject,
} from './rules.js';
export { EscalationBus, type EscalationHandler, type EscalationSink } from './bus.js';
export {
  createDeduplicatingHandler,
  DEFAULT_DEDUPE_MAX_ENTRIES,
  type DeduplicatingHandlerOptions,
} from './dedupe.js';
export {
  createFileFallbackLog,
  readFallbackLog,
  type EscalationFallbackLog,
} from './fallback-log.js';
export {
  createEscalationPublisher,
  type EscalationPublisher,
  type EscalationPublisherOptions,
  type PublishOutcome,
} from './publisher.js';
