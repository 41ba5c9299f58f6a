// Agents router - performance reports and engine-backed agent runs

import { z } from 'zod';
import type { AgentAnalysisRecord } from '@carechain/protocol';
import { isJsonObject, runAgent } from '@carechain/runtime';
import { router, TRPCError } from '../index.js';
import { callerProcedure, processingProcedure } from '../middleware.js';
import {
  AgentTypeSchema,
  AnalysisIdSchema,
  CaseSessionSchema,
  SnapshotSchema,
  TimeWindowSchema,
  TokenSchema,
} from './schemas.js';

const MAX_UPSTREAM = 50;

export const agentsRouter = router({
  /**
   * Aggregate metrics for one agent type over a window (default 24 hours).
   */
  performance: callerProcedure
    .input(TimeWindowSchema.extend({ agentType: AgentTypeSchema }))
    .query(({ ctx, input }) => {
      const { agentType, ...window } = input;
      return ctx.services.query.agentPerformance(agentType, window);
    }),

  /**
   * Run one agent step through the configured engine and record it.
   * The parent defaults to the last upstream record.
   */
  run: processingProcedure
    .input(
      z.object({
        agentType: AgentTypeSchema,
        token: TokenSchema,
        caseSession: CaseSessionSchema,
        input: SnapshotSchema,
        upstreamAnalysisIds: z.array(AnalysisIdSchema).max(MAX_UPSTREAM).default([]),
        parentAnalysisId: AnalysisIdSchema.optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const task = input.input;
      if (!isJsonObject(task)) {
        throw new TRPCError({ code: 'BAD_REQUEST', message: 'Input must be a JSON object' });
      }

      const upstream: AgentAnalysisRecord[] = [];
      for (const analysisId of input.upstreamAnalysisIds) {
        upstream.push(await ctx.services.query.getAnalysis(analysisId));
      }

      const result = await runAgent(ctx.services.engine, ctx.services.recorder, {
        agentType: input.agentType,
        token: input.token,
        caseSession: input.caseSession,
        input: task,
        upstream,
        parentAnalysisId: input.parentAnalysisId,
      });

      return {
        analysisId: result.analysisId,
        record: result.record,
        escalation: result.escalation
          ? { eventId: result.escalation.event.eventId, outcome: result.escalation.outcome }
          : null,
      };
    }),
});
