// tRPC initialization
//
// Sets up tRPC with the superjson transformer and an error formatter that
// exposes the validation reason code (never the offending content).

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { ValidationError } from '@carechain/runtime';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        code: error.code,
        reason: error.cause instanceof ValidationError ? error.cause.reason : undefined,
      },
    };
  },
});

export const router = t.router;

/**
 * Base procedure. Use the procedures from middleware.ts in routers; they
 * add caller checks and error mapping on top of this.
 */
export const publicProcedure = t.procedure;

export const middleware = t.middleware;

/**
 * Server-side caller factory, used by tests and in-process clients.
 */
export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
