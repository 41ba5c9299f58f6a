// Identity router - hospital-side tokenization
//
// Every call reaches the tokenization service with the caller from the
// request headers, so each one is audited there.

import { z } from 'zod';
import { router } from '../index.js';
import { hospitalProcedure } from '../middleware.js';
import { TokenSchema } from './schemas.js';

export const identityRouter = router({
  tokenize: hospitalProcedure
    .input(z.object({ attributes: z.record(z.string()) }))
    .mutation(({ ctx, input }) => ctx.services.tokenization.tokenize(input.attributes, ctx.caller)),

  resolve: hospitalProcedure
    .input(z.object({ token: TokenSchema }))
    .query(({ ctx, input }) => ctx.services.tokenization.resolve(input.token, ctx.caller)),

  deactivate: hospitalProcedure
    .input(z.object({ token: TokenSchema }))
    .mutation(({ ctx, input }) => ctx.services.tokenization.deactivate(input.token, ctx.caller)),
});
