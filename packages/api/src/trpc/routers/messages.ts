// Messages router - hand-off point for channel adapters

import { z } from 'zod';
import { technicalReply } from '@carechain/runtime';
import { router } from '../index.js';
import { callerProcedure } from '../middleware.js';

const RawMessageSchema = z.object({
  senderRef: z.string(),
  body: z.string().optional(),
  mediaLocator: z.string().optional(),
  mediaType: z.string().optional(),
  mediaSize: z.number().optional(),
});

export const messagesRouter = router({
  /**
   * Validate and enqueue one inbound message.
   *
   * Rejections are results, not errors: the adapter relays `reply` to the
   * sender either way.
   */
  receive: callerProcedure.input(RawMessageSchema).mutation(async ({ ctx, input }) => {
    const result = await ctx.services.input.receive(input);
    const reply = technicalReply(result);

    switch (result.status) {
      case 'accepted':
        return {
          status: result.status,
          sessionId: result.envelope.sessionId,
          processingId: result.envelope.auditTrail.processingId,
          reply,
        };
      case 'rejected':
        return { status: result.status, reason: result.error.reason, reply };
      case 'delivery_failed':
        return { status: result.status, sessionId: result.envelope.sessionId, reply };
    }
  }),
});
