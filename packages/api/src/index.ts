// @carechain/api
// tRPC surface over the runtime services

export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createContext, getCallerFromHeaders, CALLER_HEADERS, type Context } from './trpc/context.js';
export { createCallerFactory } from './trpc/index.js';
export { toTRPCError } from './trpc/errors.js';
export { createServices, type Services, type ServiceOverrides } from './services.js';
