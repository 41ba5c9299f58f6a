// In-process escalation bus
//
// Fans escalation events out to subscribers (notification service, review
// queue adapters). Single-process only; a multi-instance deployment puts a
// broker behind the same EscalationSink interface.

import type { EscalationEvent } from '@carechain/protocol';

export type EscalationHandler = (event: EscalationEvent) => void | Promise<void>;

/**
 * Anything that accepts escalation events. Rejects when delivery failed.
 */
export interface EscalationSink {
  publish(event: EscalationEvent): Promise<void>;
}

export class EscalationBus implements EscalationSink {
  private handlers: Set<EscalationHandler> = new Set();

  /**
   * Subscribe to every escalation.
   *
   * @returns Unsubscribe function
   */
  subscribe(handler: EscalationHandler): () => void {
    // Wrap so the same function can be subscribed twice and removed independently
    const entry: EscalationHandler = (event) => handler(event);
    this.handlers.add(entry);
    return () => {
      this.handlers.delete(entry);
    };
  }

  /**
   * Deliver an event to every subscriber.
   *
   * All handlers run even if one fails; the publish then rejects with the
   * first failure so the caller can retry. Handlers must therefore tolerate
   * redelivery.
   */
  async publish(event: EscalationEvent): Promise<void> {
    const results = await Promise.allSettled(
      [...this.handlers].map(async (handler) => handler(event))
    );
    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `${failures.length} escalation handler(s) failed`
      );
    }
  }

  subscriberCount(): number {
    return this.handlers.size;
  }
}
