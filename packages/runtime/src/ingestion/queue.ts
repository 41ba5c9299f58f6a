// Envelope queue - the hand-off between the input layer and the agents
//
// Delivery is at-least-once: the input layer retries enqueue, so consumers
// may see an envelope twice and should key work by sessionId.

import type { InputEnvelope } from '@carechain/protocol';

export interface EnvelopeQueue {
  enqueue(envelope: InputEnvelope): Promise<void>;
}

/**
 * In-process queue for development and tests.
 * Envelopes wait until dequeued; each is handed out once.
 */
export interface InMemoryEnvelopeQueue extends EnvelopeQueue {
  dequeue(): InputEnvelope | undefined;
  /** Remove and return everything queued */
  drain(): InputEnvelope[];
  readonly size: number;
}

export function createInMemoryEnvelopeQueue(): InMemoryEnvelopeQueue {
  const items: InputEnvelope[] = [];

  return {
    async enqueue(envelope) {
      items.push(envelope);
    },
    dequeue() {
      return items.shift();
    },
    drain() {
      return items.splice(0, items.length);
    },
    get size() {
      return items.length;
    },
  };
}
