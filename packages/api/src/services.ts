// Service wiring
//
// Builds the runtime services the API serves from configuration. Supports
// two storage modes per store:
// - In-memory (default in development): no setup required
// - Postgres: set IDENTITY_DATABASE_URL / PROCESSING_DATABASE_URL
//
// The two stores are always separate connections, so the processing side
// never holds a handle on the identity-bearing database.

import type { EscalationEvent } from '@carechain/protocol';
import {
  createInMemoryIdentityStore,
  createInMemoryProcessingStore,
  postgres,
  type IdentityStoreContext,
  type ProcessingStoreContext,
} from '@carechain/repositories';
import {
  EscalationBus,
  compileEscalationRules,
  consoleLogger,
  createChainQueryEngine,
  createDeduplicatingHandler,
  createEngineFromConfig,
  createEscalationPublisher,
  createFileFallbackLog,
  createInMemoryEnvelopeQueue,
  createInputLayer,
  createRecorder,
  createTokenizationService,
  type AnalysisEngine,
  type ChainQueryEngine,
  type Config,
  type EnvelopeQueue,
  type EscalationFallbackLog,
  type InputLayer,
  type Logger,
  type Recorder,
  type TokenizationService,
} from '@carechain/runtime';

export type Services = {
  tokenization: TokenizationService;
  input: InputLayer;
  recorder: Recorder;
  query: ChainQueryEngine;
  engine: AnalysisEngine;
  escalations: EscalationBus;
  processing: ProcessingStoreContext;
  logger: Logger;

  /** Close database connections */
  close(): Promise<void>;
};

export type ServiceOverrides = {
  logger?: Logger;
  identityStore?: IdentityStoreContext;
  processingStore?: ProcessingStoreContext;
  queue?: EnvelopeQueue;
  fallbackLog?: EscalationFallbackLog;
  fetch?: typeof fetch;
  now?: () => Date;
};

/**
 * Escalation consumer that records every event once in the service log.
 * Notification channels subscribe to the same bus.
 */
function logEscalation(logger: Logger) {
  return createDeduplicatingHandler((event: EscalationEvent) => {
    logger.warn('Escalation raised', {
      eventId: event.eventId,
      analysisId: event.analysisId,
      token: event.token,
      caseSession: event.caseSession,
      severity: event.severity,
      triggerReasons: event.triggerReasons,
    });
  });
}

/**
 * Build services from configuration.
 *
 * Overrides replace individual dependencies (tests pass in-memory stores
 * and a temp fallback log).
 *
 * @throws RuleCompilationError if the configured escalation rules are invalid
 */
export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? consoleLogger;
  const closers: Array<() => Promise<void>> = [];

  function identityStore(): IdentityStoreContext {
    if (overrides.identityStore) return overrides.identityStore;
    if (!config.identityDatabaseUrl) {
      logger.info('Using in-memory identity store');
      return createInMemoryIdentityStore();
    }
    const { db, client } = postgres.createDatabase({
      connectionString: config.identityDatabaseUrl,
      maxConnections: 3,
    });
    closers.push(() => client.end());
    return postgres.createPgIdentityStore(db);
  }

  function processingStore(): ProcessingStoreContext {
    if (overrides.processingStore) return overrides.processingStore;
    if (!config.processingDatabaseUrl) {
      logger.info('Using in-memory processing store');
      return createInMemoryProcessingStore();
    }
    const { db, client } = postgres.createDatabase({
      connectionString: config.processingDatabaseUrl,
    });
    closers.push(() => client.end());
    return postgres.createPgProcessingStore(db);
  }

  const processing = processingStore();
  const rules = compileEscalationRules(config.escalationRules);

  const escalations = new EscalationBus();
  escalations.subscribe(logEscalation(logger));

  const publisher = createEscalationPublisher({
    sink: escalations,
    fallback: overrides.fallbackLog ?? createFileFallbackLog(config.escalationFallbackLog),
    retry: config.retry,
    logger,
  });

  return {
    tokenization: createTokenizationService({
      store: identityStore(),
      keySecret: config.identityKeySecret,
      encryptionKey: config.identityEncryptionKey,
      keySets: config.identityKeySets,
      retry: config.retry,
      logger,
      now: overrides.now,
    }),
    input: createInputLayer({
      queue: overrides.queue ?? createInMemoryEnvelopeQueue(),
      senderHashSecret: config.senderHashSecret,
      maxPayloadBytes: config.maxPayloadBytes,
      supportedMediaTypes: config.supportedMediaTypes,
      retry: config.retry,
      logger,
      now: overrides.now,
    }),
    recorder: createRecorder({ processing, rules, publisher, retry: config.retry, logger }),
    query: createChainQueryEngine({ processing, retry: config.retry, logger, now: overrides.now }),
    engine: createEngineFromConfig(config.engine, { fetch: overrides.fetch, logger }),
    escalations,
    processing,
    logger,

    async close() {
      await Promise.all(closers.map((close) => close()));
    },
  };
}
