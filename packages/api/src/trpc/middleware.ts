// tRPC middleware for error mapping and caller checks

import type { CallerDomain } from '@carechain/protocol';
import { middleware, publicProcedure, TRPCError } from './index.js';
import { toTRPCError } from './errors.js';

/**
 * Turns domain errors thrown by procedures into tRPC errors with a
 * matching code. Errors tRPC raised itself (input validation, caller
 * checks) pass through untouched.
 */
const mapDomainErrors = middleware(async ({ next }) => {
  const result = await next();
  if (result.ok || result.error.code !== 'INTERNAL_SERVER_ERROR') {
    return result;
  }
  throw toTRPCError(result.error.cause ?? result.error);
});

/**
 * Middleware that requires caller headers.
 *
 * Ensures ctx.caller is not null and passes the narrowed context on.
 */
const hasCaller = middleware(async ({ ctx, next }) => {
  if (!ctx.caller) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Caller headers required',
    });
  }

  return next({
    ctx: {
      ...ctx,
      caller: ctx.caller,
    },
  });
});

/**
 * Create middleware that requires a caller from one side of the boundary.
 */
function requiresDomain(domain: CallerDomain) {
  return middleware(async ({ ctx, next }) => {
    if (!ctx.caller) {
      throw new TRPCError({
        code: 'UNAUTHORIZED',
        message: 'Caller headers required',
      });
    }

    if (ctx.caller.domain !== domain) {
      throw new TRPCError({
        code: 'FORBIDDEN',
        message: `This operation requires a ${domain} caller`,
      });
    }

    return next({ ctx: { ...ctx, caller: ctx.caller } });
  });
}

/**
 * Base for every procedure in the API.
 */
export const baseProcedure = publicProcedure.use(mapDomainErrors);

/**
 * Any identified caller.
 */
export const callerProcedure = baseProcedure.use(hasCaller);

/**
 * Callers inside the hospital domain. The tokenization service checks
 * this again on its own.
 */
export const hospitalProcedure = baseProcedure.use(requiresDomain('hospital'));

/**
 * Agents and other processing-side callers.
 */
export const processingProcedure = baseProcedure.use(requiresDomain('processing'));
