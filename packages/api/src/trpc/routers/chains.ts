// Chains router - read-only views of a case's analysis chain

import { z } from 'zod';
import { router } from '../index.js';
import { callerProcedure } from '../middleware.js';
import { AnalysisIdSchema, CaseSessionSchema, TokenSchema } from './schemas.js';

export const chainsRouter = router({
  /**
   * All records of a case session, parents before children.
   */
  get: callerProcedure
    .input(z.object({ caseSession: CaseSessionSchema }))
    .query(({ ctx, input }) => ctx.services.query.getChain(input.caseSession)),

  /**
   * A single analysis record.
   */
  analysis: callerProcedure
    .input(z.object({ analysisId: AnalysisIdSchema }))
    .query(({ ctx, input }) => ctx.services.query.getAnalysis(input.analysisId)),

  /**
   * Ancestors, children and decision flow around one record.
   */
  trace: callerProcedure
    .input(z.object({ analysisId: AnalysisIdSchema }))
    .query(({ ctx, input }) => ctx.services.query.tracePathway(input.analysisId)),

  correlate: callerProcedure
    .input(z.object({ caseSession: CaseSessionSchema }))
    .query(({ ctx, input }) => ctx.services.query.correlate(input.caseSession)),

  sessionsForToken: callerProcedure
    .input(z.object({ token: TokenSchema }))
    .query(({ ctx, input }) => ctx.services.query.getSessionsForToken(input.token)),
});
