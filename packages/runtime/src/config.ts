// Configuration
//
// Loaded once at startup from environment variables and validated with zod.
// Identity key sets and the escalation threshold table are deployment policy;
// the defaults below apply when nothing is configured.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EscalationRule } from '@carechain/protocol';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_PAYLOAD_BYTES = 10 * 1024 * 1024;

export const DEFAULT_SUPPORTED_MEDIA_TYPES = [
  'image/jpeg',
  'image/jpg',
  'image/png',
  'image/webp',
  'video/mp4',
  'video/quicktime',
  'video/x-msvideo',
];

/**
 * Attribute sets that each identify a patient on their own.
 * The first satisfied set yields the mapping's primary key hash.
 */
export const DEFAULT_IDENTITY_KEY_SETS = [['mrn'], ['fullName', 'dateOfBirth']];

export const DEFAULT_ESCALATION_RULES: EscalationRule[] = [
  {
    name: 'low_confidence_detected',
    kind: 'confidence_below',
    source: 'confidence',
    threshold: 0.6,
    severity: 'medium',
  },
  {
    name: 'high_risk_score_detected',
    kind: 'metric_above',
    source: 'output',
    metric: 'risk_percentage',
    threshold: 0.75,
    severity: 'high',
  },
];

/** Development-only placeholders; rejected when NODE_ENV=production */
const PLACEHOLDER_SECRETS = {
  identityKeySecret: 'dev-identity-key-secret',
  identityEncryptionKey: 'dev-identity-encryption-key',
  senderHashSecret: 'dev-sender-hash-secret',
};

const severitySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const escalationRuleSchema = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/),
    kind: z.enum(['confidence_below', 'metric_above', 'metric_below']),
    source: z.enum(['confidence', 'output']).optional(),
    metric: z.string().min(1).optional(),
    threshold: z.number().finite(),
    severity: severitySchema,
    agentTypes: z.array(z.string().min(1)).optional(),
  })
  .transform(
    (rule): EscalationRule => ({
      ...rule,
      source: rule.source ?? (rule.kind === 'confidence_below' ? 'confidence' : 'output'),
    })
  );

const configSchema = z
  .object({
    nodeEnv: z.enum(['development', 'test', 'production']).default('development'),
    maxPayloadBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_PAYLOAD_BYTES),
    supportedMediaTypes: z.array(z.string().min(1)).min(1).default(DEFAULT_SUPPORTED_MEDIA_TYPES),
    retry: z
      .object({
        maxAttempts: z.coerce.number().int().min(1).max(20).default(3),
        baseDelayMs: z.coerce.number().int().min(0).default(100),
        maxDelayMs: z.coerce.number().int().min(0).default(2000),
      })
      .default({}),
    identityKeySecret: z.string().min(16).default(PLACEHOLDER_SECRETS.identityKeySecret),
    identityEncryptionKey: z.string().min(16).default(PLACEHOLDER_SECRETS.identityEncryptionKey),
    senderHashSecret: z.string().min(16).default(PLACEHOLDER_SECRETS.senderHashSecret),
    identityKeySets: z
      .array(z.array(z.string().min(1)).min(1))
      .min(1)
      .default(DEFAULT_IDENTITY_KEY_SETS),
    escalationRules: z.array(escalationRuleSchema).default(DEFAULT_ESCALATION_RULES),
    escalationFallbackLog: z.string().min(1).default('data/escalations.fallback.ndjson'),
    engine: z
      .object({
        mode: z.enum(['deterministic', 'remote']).default('deterministic'),
        url: z.string().url().optional(),
        timeoutMs: z.coerce.number().int().positive().default(30000),
      })
      .default({}),
    identityDatabaseUrl: z.string().min(1).optional(),
    processingDatabaseUrl: z.string().min(1).optional(),
    port: z.coerce.number().int().min(0).max(65535).default(3000),
  })
  .superRefine((config, ctx) => {
    if (config.engine.mode === 'remote' && !config.engine.url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['engine', 'url'],
        message: 'ENGINE_URL is required when ENGINE_MODE=remote',
      });
    }
    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'must be at least baseDelayMs',
      });
    }
    if (config.nodeEnv === 'production') {
      const secrets: Array<[string, string, string]> = [
        ['identityKeySecret', config.identityKeySecret, PLACEHOLDER_SECRETS.identityKeySecret],
        [
          'identityEncryptionKey',
          config.identityEncryptionKey,
          PLACEHOLDER_SECRETS.identityEncryptionKey,
        ],
        ['senderHashSecret', config.senderHashSecret, PLACEHOLDER_SECRETS.senderHashSecret],
      ];
      for (const [key, value, placeholder] of secrets) {
        if (value === placeholder) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'must be set in production',
          });
        }
      }
    }
  });

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

type Env = Record<string, string | undefined>;

function parseJsonVar(env: Env, name: string, issues: string[]): unknown {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    issues.push(`${name}: not valid JSON`);
    return undefined;
  }
}

function parseListVar(env: Env, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readRulesFile(path: string, issues: string[]): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    issues.push(
      `ESCALATION_RULES_FILE: ${error instanceof Error ? error.message : 'unreadable'}`
    );
    return undefined;
  }
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the raw (unvalidated) configuration object from environment variables.
 */
function fromEnv(env: Env, issues: string[]): Record<string, unknown> {
  const rulesFile = blankToUndefined(env.ESCALATION_RULES_FILE);
  const escalationRules =
    parseJsonVar(env, 'ESCALATION_RULES', issues) ??
    (rulesFile ? readRulesFile(rulesFile, issues) : undefined);

  return {
    nodeEnv: blankToUndefined(env.NODE_ENV),
    maxPayloadBytes: blankToUndefined(env.MAX_PAYLOAD_BYTES),
    supportedMediaTypes: parseListVar(env, 'SUPPORTED_MEDIA_TYPES'),
    retry: {
      maxAttempts: blankToUndefined(env.RETRY_MAX_ATTEMPTS),
      baseDelayMs: blankToUndefined(env.RETRY_BASE_DELAY_MS),
      maxDelayMs: blankToUndefined(env.RETRY_MAX_DELAY_MS),
    },
    identityKeySecret: blankToUndefined(env.IDENTITY_KEY_SECRET),
    identityEncryptionKey: blankToUndefined(env.IDENTITY_ENCRYPTION_KEY),
    senderHashSecret: blankToUndefined(env.SENDER_HASH_SECRET),
    identityKeySets: parseJsonVar(env, 'IDENTITY_KEY_SETS', issues),
    escalationRules,
    escalationFallbackLog: blankToUndefined(env.ESCALATION_FALLBACK_LOG),
    engine: {
      mode: blankToUndefined(env.ENGINE_MODE),
      url: blankToUndefined(env.ENGINE_URL),
      timeoutMs: blankToUndefined(env.ENGINE_TIMEOUT_MS),
    },
    identityDatabaseUrl: blankToUndefined(env.IDENTITY_DATABASE_URL),
    processingDatabaseUrl: blankToUndefined(env.PROCESSING_DATABASE_URL),
    port: blankToUndefined(env.PORT),
  };
}

/**
 * Load and validate configuration.
 *
 * `overrides` win over the environment; nested `retry` and `engine`
 * objects are merged field by field.
 *
 * @throws ConfigurationError listing every problem found
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * const testConfig = loadConfig({}, { nodeEnv: 'test', retry: { maxAttempts: 1 } });
 * ```
 */
export function loadConfig(env: Env = process.env, overrides: Partial<ConfigInput> = {}): Config {
  const issues: string[] = [];
  const raw = fromEnv(env, issues);

  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const base = merged[key];
    merged[key] =
      (key === 'retry' || key === 'engine') && isRecord(base) && isRecord(value)
        ? { ...base, ...value }
        : value;
  }

  const result = configSchema.safeParse(stripUndefined(merged));
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
  }

  if (issues.length > 0 || !result.success) {
    throw new ConfigurationError(issues);
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    result[key] = isRecord(child) ? stripUndefined(child) : child;
  }
  return result;
}
