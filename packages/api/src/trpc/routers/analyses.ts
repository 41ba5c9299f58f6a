// Analyses router - the write path for agents that analyze elsewhere

import { z } from 'zod';
import { router } from '../index.js';
import { processingProcedure } from '../middleware.js';
import {
  AgentTypeSchema,
  AnalysisIdSchema,
  CaseSessionSchema,
  SnapshotSchema,
  TokenSchema,
} from './schemas.js';

const RecordAnalysisSchema = z.object({
  agentType: AgentTypeSchema,
  token: TokenSchema,
  caseSession: CaseSessionSchema,
  inputSnapshot: SnapshotSchema,
  outputSnapshot: SnapshotSchema,
  confidenceScores: z.record(z.number()).optional(),
  evidenceReferences: z.array(z.string()).optional(),
  parentAnalysisId: AnalysisIdSchema.optional(),
  status: z.enum(['completed', 'failed']).optional(),
  startedAt: z.number().optional(),
});

export const analysesRouter = router({
  /**
   * Record one analysis. Resolves once the record is durable; escalation
   * (if any) has been published or written to the fallback log by then.
   */
  record: processingProcedure.input(RecordAnalysisSchema).mutation(async ({ ctx, input }) => {
    const result = await ctx.services.recorder.record(input);
    return {
      analysisId: result.analysisId,
      createdAt: result.record.createdAt,
      triggers: result.record.escalationTriggers,
      escalation: result.escalation
        ? { eventId: result.escalation.event.eventId, outcome: result.escalation.outcome }
        : null,
    };
  }),
});
