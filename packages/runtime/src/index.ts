// @carechain/runtime
// Tokenization, isolated input, analysis chain recording and querying

// Tokenization (identity-bearing side of the boundary)
export * from './tokenization/index.js';

// Isolated input layer
export * from './ingestion/index.js';

// Analysis chain recorder
export * from './recorder/index.js';

// Escalation rules, bus and reliable publication
export * from './escalation/index.js';

// Read-only chain queries
export * from './query/index.js';

// Analysis engines and the agent contract
export * from './engines/index.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  AccessDeniedError,
  AmbiguousIdentityError,
  TokenNotFoundError,
  AnalysisNotFoundError,
  DeliveryFailedError,
  EscalationDeliveryError,
  RuleCompilationError,
  ConfigurationError,
  EngineError,
  type ValidationReason,
  type AmbiguityReason,
} from './errors.js';
export {
  RepositoryError,
  StoreUnavailableError,
  UniqueConstraintError,
  AcyclicityViolation,
} from '@carechain/repositories';

// Configuration
export {
  loadConfig,
  escalationRuleSchema,
  DEFAULT_ESCALATION_RULES,
  DEFAULT_IDENTITY_KEY_SETS,
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_SUPPORTED_MEDIA_TYPES,
  type Config,
  type ConfigInput,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  describeError,
  type Logger,
  type LogEntry,
} from './logger.js';

// Retry and hashing
export {
  retryWithBackoff,
  calculateBackoffDelay,
  type RetryOptions,
  type RetrySettings,
} from './retry.js';
export { withStoreRetry } from './store-retry.js';
export { sha256Hex, hmacSha256Hex, canonicalJsonStringify, contentHash } from './hash.js';
