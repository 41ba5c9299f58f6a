import type { EscalationEvent } from '@carechain/protocol';
import type { EscalationHandler } from './bus.js';

export const DEFAULT_DEDUPE_MAX_ENTRIES = 10_000;

export type DeduplicatingHandlerOptions = {
  /** Analyses remembered at once; the oldest is forgotten first */
  maxEntries?: number;
};

/**
 * Wrap a consumer so each analysis is handled once, however often its
 * escalation is redelivered. A failed delivery is forgotten so the next
 * redelivery gets through. Only the most recent `maxEntries` analyses are
 * remembered, so a redelivery older than that is handled again.
 */
export function createDeduplicatingHandler(
  handler: (event: EscalationEvent) => void | Promise<void>,
  options: DeduplicatingHandlerOptions = {}
): EscalationHandler {
  const maxEntries = options.maxEntries ?? DEFAULT_DEDUPE_MAX_ENTRIES;
  if (!Number.isSafeInteger(maxEntries) || maxEntries < 1) {
    throw new RangeError('maxEntries must be a positive integer');
  }
  // Set iteration follows insertion order, so the first entry is the oldest.
  const seen = new Set<string>();

  return async (event) => {
    if (seen.has(event.analysisId)) return;
    seen.add(event.analysisId);
    if (seen.size > maxEntries) {
      for (const oldest of seen) {
        seen.delete(oldest);
        break;
      }
    }
    try {
      await handler(event);
    } catch (error) {
      seen.delete(event.analysisId);
      throw error;
    }
  };
}
