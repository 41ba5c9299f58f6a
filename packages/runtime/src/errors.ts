// Runtime error types
//
// Store errors (StoreUnavailableError, AcyclicityViolation, UniqueConstraintError)
// live in @carechain/repositories and are re-exported from the package index.

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Reason codes carried by ValidationError. They name the rule that
 * failed, never the offending content.
 */
export type ValidationReason =
  | 'malformed_message'
  | 'empty_content'
  | 'unsupported_media_type'
  | 'payload_too_large'
  | 'invalid_token'
  | 'invalid_agent_type'
  | 'invalid_case_session'
  | 'invalid_confidence'
  | 'invalid_evidence'
  | 'invalid_snapshot'
  | 'invalid_status'
  | 'invalid_parent'
  | 'invalid_window'
  | 'identity_leak'
  | 'invalid_attributes'
  | 'no_identity_key'
  | 'invalid_caller';

const VALIDATION_MESSAGES: Record<ValidationReason, string> = {
  malformed_message: 'The message could not be accepted',
  empty_content: 'The message has no content',
  unsupported_media_type: 'The attached media type is not supported',
  payload_too_large: 'The message exceeds the maximum size',
  invalid_token: 'The token is not valid',
  invalid_agent_type: 'The agent type is not valid',
  invalid_case_session: 'The case session is not valid',
  invalid_confidence: 'Confidence scores must be numbers between 0 and 1',
  invalid_evidence: 'Evidence references must be non-empty strings',
  invalid_snapshot: 'Snapshots must be JSON objects',
  invalid_status: 'The analysis status is not valid',
  invalid_parent: 'The parent analysis id is not valid',
  invalid_window: 'The time window is not valid',
  identity_leak: 'The record contains identity-bearing content',
  invalid_attributes: 'Identity attributes must be a map of strings',
  no_identity_key: 'The identity attributes do not satisfy any key set',
  invalid_caller: 'The caller context is not valid',
};

/**
 * Validation error for malformed or invalid input.
 *
 * Terminal: retrying the same input fails the same way. The message is
 * fixed per reason so it can be shown to a sender without leaking content.
 */
export class ValidationError extends RuntimeError {
  readonly reason: ValidationReason;
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    reason: ValidationReason,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', VALIDATION_MESSAGES[reason]);
    this.name = 'ValidationError';
    this.reason = reason;
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A caller on the wrong side of the privacy boundary asked for identity.
 */
export class AccessDeniedError extends RuntimeError {
  readonly callerId: string;
  readonly operation: string;

  constructor(callerId: string, operation: string) {
    super('ACCESS_DENIED', `Caller ${callerId} may not ${operation}`);
    this.name = 'AccessDeniedError';
    this.callerId = callerId;
    this.operation = operation;
  }
}

export type AmbiguityReason = 'multiple_tokens' | 'conflicting_attributes';

/**
 * The attributes cannot be tied to exactly one identity: their key hashes
 * point at more than one token, or they match a stored identity on one key
 * set and contradict it on another. Never merged automatically.
 */
export class AmbiguousIdentityError extends RuntimeError {
  readonly reason: AmbiguityReason;
  readonly tokenCount: number;

  constructor(reason: AmbiguityReason, tokenCount: number) {
    super(
      'AMBIGUOUS_IDENTITY',
      reason === 'multiple_tokens'
        ? `Identity attributes match ${tokenCount} distinct tokens`
        : 'Identity attributes contradict the identity they match'
    );
    this.name = 'AmbiguousIdentityError';
    this.reason = reason;
    this.tokenCount = tokenCount;
  }
}

/**
 * Error when a token has no identity mapping.
 */
export class TokenNotFoundError extends RuntimeError {
  readonly token: string;

  constructor(token: string) {
    super('TOKEN_NOT_FOUND', `Token not found: ${token}`);
    this.name = 'TokenNotFoundError';
    this.token = token;
  }
}

/**
 * Error when a referenced analysis record does not exist.
 */
export class AnalysisNotFoundError extends RuntimeError {
  readonly analysisId: string;

  constructor(analysisId: string) {
    super('ANALYSIS_NOT_FOUND', `Analysis not found: ${analysisId}`);
    this.name = 'AnalysisNotFoundError';
    this.analysisId = analysisId;
  }
}

/**
 * The downstream queue refused an envelope after every retry.
 */
export class DeliveryFailedError extends RuntimeError {
  readonly sessionId: string;
  readonly attempts: number;

  constructor(sessionId: string, attempts: number, cause?: unknown) {
    super('DELIVERY_FAILED', `Envelope ${sessionId} not delivered after ${attempts} attempts`, {
      cause,
    });
    this.name = 'DeliveryFailedError';
    this.sessionId = sessionId;
    this.attempts = attempts;
  }
}

/**
 * An escalation event could be neither published nor written to the
 * fallback log.
 */
export class EscalationDeliveryError extends RuntimeError {
  readonly eventId: string;
  readonly analysisId: string;

  constructor(eventId: string, analysisId: string, cause?: unknown) {
    super('ESCALATION_DELIVERY_FAILED', `Escalation ${eventId} for ${analysisId} was not delivered`, {
      cause,
    });
    this.name = 'EscalationDeliveryError';
    this.eventId = eventId;
    this.analysisId = analysisId;
  }
}

/**
 * Error when an escalation rule definition is invalid.
 */
export class RuleCompilationError extends RuntimeError {
  readonly ruleName: string;

  constructor(ruleName: string, reason: string) {
    super('RULE_COMPILATION_ERROR', `Escalation rule "${ruleName}" is invalid: ${reason}`);
    this.name = 'RuleCompilationError';
    this.ruleName = ruleName;
  }
}

/**
 * Error when configuration is missing or invalid.
 */
export class ConfigurationError extends RuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error when the analysis engine fails or returns an unusable result.
 */
export class EngineError extends RuntimeError {
  readonly agentType: string;

  constructor(agentType: string, reason: string, cause?: unknown) {
    super('ENGINE_ERROR', `Analysis engine failed for ${agentType}: ${reason}`, { cause });
    this.name = 'EngineError';
    this.agentType = agentType;
  }
}
