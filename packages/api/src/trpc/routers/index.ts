// Root router - combines all domain routers

import { router } from '../index.js';
import { agentsRouter } from './agents.js';
import { analysesRouter } from './analyses.js';
import { chainsRouter } from './chains.js';
import { identityRouter } from './identity.js';
import { messagesRouter } from './messages.js';

/**
 * The root router.
 *
 * Usage from a client:
 * ```ts
 * const chain = await trpc.chains.get.query({ caseSession: 'case_7f3a' });
 *
 * const { analysisId } = await trpc.analyses.record.mutate({
 *   agentType: 'risk_assessment',
 *   token: 'batman_ab12cd34',
 *   caseSession: 'case_7f3a',
 *   ...
 * });
 * ```
 */
export const appRouter = router({
  messages: messagesRouter,
  identity: identityRouter,
  analyses: analysesRouter,
  agents: agentsRouter,
  chains: chainsRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
