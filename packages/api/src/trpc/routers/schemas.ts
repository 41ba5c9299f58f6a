// Shared input schemas. Structural checks only; the runtime services apply
// the full validation rules and report them as BAD_REQUEST.

import { z } from 'zod';
import { TOKEN_PATTERN } from '@carechain/protocol';

export const TokenSchema = z.string().regex(TOKEN_PATTERN, 'Not a valid token');

export const CaseSessionSchema = z.string().min(1).max(128);

export const AnalysisIdSchema = z.string().min(1).max(128);

export const AgentTypeSchema = z.string().min(1).max(64);

export const SnapshotSchema = z.record(z.unknown());

export const TimeWindowSchema = z.object({
  hours: z.number().positive().max(24 * 366).optional(),
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional(),
});
