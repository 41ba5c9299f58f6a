// Durable fallback for escalations that could not be published
//
// One event per line (NDJSON), appended. An operator replays the file into
// the sink once it is back; consumers deduplicate by analysisId, so
// replaying an event that did get through is harmless.

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { parseNdjson, stringifyNdjsonLine, type EscalationEvent } from '@carechain/protocol';

export interface EscalationFallbackLog {
  append(event: EscalationEvent): Promise<void>;
}

const escalationEventSchema = z.object({
  eventId: z.string().min(1),
  analysisId: z.string().min(1),
  token: z.string().min(1),
  caseSession: z.string().min(1),
  triggerReasons: z.array(z.string()),
  severity: z.enum(['low', 'medium', 'high', 'critical']),
  createdAt: z.string().min(1),
});

/**
 * Fallback log backed by a local file. Parent directories are created on
 * first write.
 */
export function createFileFallbackLog(path: string): EscalationFallbackLog {
  return {
    async append(event) {
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, stringifyNdjsonLine(event), 'utf8');
    },
  };
}

/**
 * Read back every event in a fallback log. A missing file reads as empty.
 *
 * @throws Error on a line that is not a valid escalation event
 */
export async function readFallbackLog(path: string): Promise<EscalationEvent[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return parseNdjson(content).map((line, index) => {
    const parsed = escalationEventSchema.safeParse(line);
    if (!parsed.success) {
      throw new Error(`Invalid escalation event at line ${index + 1}`);
    }
    return parsed.data;
  });
}
