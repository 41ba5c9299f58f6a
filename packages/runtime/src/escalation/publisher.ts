// Reliable escalation publication
//
// publish -> bounded retry -> fallback log -> EscalationDeliveryError.
// An event is never dropped without the caller hearing about it.

import type { EscalationEvent } from '@carechain/protocol';
import { EscalationDeliveryError } from '../errors.js';
import { describeError, silentLogger, type Logger } from '../logger.js';
import { retryWithBackoff, type RetrySettings } from '../retry.js';
import type { EscalationSink } from './bus.js';
import type { EscalationFallbackLog } from './fallback-log.js';

export type PublishOutcome = 'published' | 'fallback';

export interface EscalationPublisher {
  /**
   * @throws EscalationDeliveryError when both the sink and the fallback log failed
   */
  publish(event: EscalationEvent): Promise<PublishOutcome>;
}

export type EscalationPublisherOptions = {
  sink: EscalationSink;
  fallback: EscalationFallbackLog;
  retry: RetrySettings;
  logger?: Logger;
};

export function createEscalationPublisher(options: EscalationPublisherOptions): EscalationPublisher {
  const { sink, fallback, retry } = options;
  const logger = options.logger ?? silentLogger;

  return {
    async publish(event) {
      const context = { eventId: event.eventId, analysisId: event.analysisId };

      try {
        await retryWithBackoff(() => sink.publish(event), {
          ...retry,
          onRetry: (error, attempt, delayMs) => {
            logger.warn('Escalation publish failed, retrying', {
              ...context,
              attempt,
              delayMs,
              ...describeError(error),
            });
          },
        });
        logger.info('Escalation published', { ...context, severity: event.severity });
        return 'published';
      } catch (publishError) {
        logger.error('Escalation publish exhausted retries, writing fallback log', {
          ...context,
          ...describeError(publishError),
        });

        try {
          await fallback.append(event);
        } catch (fallbackError) {
          logger.error('Escalation fallback log write failed', {
            ...context,
            ...describeError(fallbackError),
          });
          throw new EscalationDeliveryError(event.eventId, event.analysisId, fallbackError);
        }
        return 'fallback';
      }
    },
  };
}
