// Escalation rules - compiles the configured threshold table into predicates
//
// Configured rules are data (see DEFAULT_ESCALATION_RULES); programmatic
// rules come from defineEscalationRule. Both compile to the same shape and
// are evaluated in order.

import {
  SEVERITY_ORDER,
  type AgentAnalysisRecord,
  type EscalationRule,
  type EscalationSeverity,
  type JsonValue,
} from '@carechain/protocol';
import { RuleCompilationError } from '../errors.js';

/**
 * The part of a record escalation rules may look at.
 */
export type EscalationSubject = Pick<
  AgentAnalysisRecord,
  'agentType' | 'confidenceScores' | 'outputSnapshot'
>;

export type EscalationPredicate = (subject: EscalationSubject) => boolean;

export type CompiledEscalationRule = {
  name: string;
  severity: EscalationSeverity;
  agentTypes?: ReadonlySet<string>;
  test: EscalationPredicate;
};

export type EscalationEvaluation = {
  /** Names of the rules that fired, in rule order */
  triggers: string[];
  /** Highest severity among fired rules, null when none fired */
  severity: EscalationSeverity | null;
};

const RULE_NAME = /^[a-z][a-z0-9_]*$/;
const RULE_KINDS = ['confidence_below', 'metric_above', 'metric_below'] as const;

/**
 * Read a numeric field from an output snapshot by dot path ("vitals.risk").
 * Returns undefined for missing or non-numeric values.
 */
export function readOutputMetric(output: JsonValue, path: string): number | undefined {
  let current: JsonValue = output;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
    current = current[segment];
  }
  return typeof current === 'number' && Number.isFinite(current) ? current : undefined;
}

function compare(kind: EscalationRule['kind'], value: number, threshold: number): boolean {
  return kind === 'metric_above' ? value > threshold : value < threshold;
}

function confidencePredicate(rule: EscalationRule): EscalationPredicate {
  const { kind, metric, threshold } = rule;
  if (metric !== undefined) {
    return ({ confidenceScores }) => {
      const value = confidenceScores[metric];
      return typeof value === 'number' && compare(kind, value, threshold);
    };
  }
  // No metric: the weakest (or, for metric_above, the strongest) score decides
  return ({ confidenceScores }) => {
    const values = Object.values(confidenceScores);
    if (values.length === 0) return false;
    const value = kind === 'metric_above' ? Math.max(...values) : Math.min(...values);
    return compare(kind, value, threshold);
  };
}

function outputPredicate(rule: EscalationRule, metric: string): EscalationPredicate {
  const { kind, threshold } = rule;
  return ({ outputSnapshot }) => {
    const value = readOutputMetric(outputSnapshot, metric);
    return value !== undefined && compare(kind, value, threshold);
  };
}

/**
 * Compile one declarative rule.
 *
 * @throws RuleCompilationError when the rule is inconsistent
 */
export function compileEscalationRule(rule: EscalationRule): CompiledEscalationRule {
  if (!RULE_NAME.test(rule.name)) {
    throw new RuleCompilationError(rule.name, 'name must be lowercase snake_case');
  }
  if (!RULE_KINDS.includes(rule.kind)) {
    throw new RuleCompilationError(rule.name, `unknown kind "${rule.kind}"`);
  }
  if (!Number.isFinite(rule.threshold)) {
    throw new RuleCompilationError(rule.name, 'threshold must be a finite number');
  }
  if (!(rule.severity in SEVERITY_ORDER)) {
    throw new RuleCompilationError(rule.name, `unknown severity "${rule.severity}"`);
  }
  if (rule.agentTypes !== undefined && rule.agentTypes.length === 0) {
    throw new RuleCompilationError(rule.name, 'agentTypes must not be empty when given');
  }

  let test: EscalationPredicate;
  if (rule.source === 'confidence') {
    if (rule.threshold < 0 || rule.threshold > 1) {
      throw new RuleCompilationError(rule.name, 'confidence thresholds must lie in [0, 1]');
    }
    test = confidencePredicate(rule);
  } else {
    if (rule.metric === undefined || rule.metric.trim() === '') {
      throw new RuleCompilationError(rule.name, 'output rules require a metric');
    }
    if (rule.kind === 'confidence_below') {
      throw new RuleCompilationError(rule.name, 'confidence_below reads confidence scores only');
    }
    test = outputPredicate(rule, rule.metric);
  }

  return {
    name: rule.name,
    severity: rule.severity,
    agentTypes: rule.agentTypes ? new Set(rule.agentTypes) : undefined,
    test,
  };
}

/**
 * Compile a rule table. Rule names must be unique.
 */
export function compileEscalationRules(rules: EscalationRule[]): CompiledEscalationRule[] {
  const seen = new Set<string>();
  return rules.map((rule) => {
    if (seen.has(rule.name)) {
      throw new RuleCompilationError(rule.name, 'duplicate rule name');
    }
    seen.add(rule.name);
    return compileEscalationRule(rule);
  });
}

/**
 * Define a rule in code, for conditions the threshold table cannot express.
 *
 * @example
 * ```typescript
 * const missingEvidence = defineEscalationRule({
 *   name: 'missing_evidence',
 *   severity: 'low',
 *   test: (record) => record.outputSnapshot.evidence_count === 0,
 * });
 * ```
 */
export function defineEscalationRule(definition: {
  name: string;
  severity: EscalationSeverity;
  agentTypes?: string[];
  test: EscalationPredicate;
}): CompiledEscalationRule {
  if (!RULE_NAME.test(definition.name)) {
    throw new RuleCompilationError(definition.name, 'name must be lowercase snake_case');
  }
  return {
    name: definition.name,
    severity: definition.severity,
    agentTypes: definition.agentTypes ? new Set(definition.agentTypes) : undefined,
    test: definition.test,
  };
}

export function evaluateEscalationRules(
  rules: readonly CompiledEscalationRule[],
  subject: EscalationSubject
): EscalationEvaluation {
  const triggers: string[] = [];
  let severity: EscalationSeverity | null = null;

  for (const rule of rules) {
    if (rule.agentTypes && !rule.agentTypes.has(subject.agentType)) continue;
    if (!rule.test(subject)) continue;
    if (triggers.includes(rule.name)) continue;

    triggers.push(rule.name);
    if (severity === null || SEVERITY_ORDER[rule.severity] > SEVERITY_ORDER[severity]) {
      severity = rule.severity;
    }
  }

  return { triggers, severity };
}
