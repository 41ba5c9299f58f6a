// Domain error -> tRPC error
//
// Messages are the domain errors' own messages, which carry ids and reason
// codes only. Anything unrecognised becomes a generic internal error.

import { TRPCError } from '@trpc/server';
import {
  AccessDeniedError,
  AcyclicityViolation,
  AmbiguousIdentityError,
  AnalysisNotFoundError,
  DeliveryFailedError,
  EscalationDeliveryError,
  StoreUnavailableError,
  TokenNotFoundError,
  UniqueConstraintError,
  ValidationError,
} from '@carechain/runtime';

type TRPCErrorCode = TRPCError['code'];

function codeFor(error: unknown): TRPCErrorCode {
  if (error instanceof ValidationError) return 'BAD_REQUEST';
  if (error instanceof AccessDeniedError) return 'FORBIDDEN';
  if (error instanceof TokenNotFoundError || error instanceof AnalysisNotFoundError) {
    return 'NOT_FOUND';
  }
  if (
    error instanceof AmbiguousIdentityError ||
    error instanceof AcyclicityViolation ||
    error instanceof UniqueConstraintError
  ) {
    return 'CONFLICT';
  }
  if (
    error instanceof StoreUnavailableError ||
    error instanceof DeliveryFailedError ||
    error instanceof EscalationDeliveryError
  ) {
    return 'SERVICE_UNAVAILABLE';
  }
  return 'INTERNAL_SERVER_ERROR';
}

export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) return error;

  const code = codeFor(error);
  const message =
    code === 'INTERNAL_SERVER_ERROR' || !(error instanceof Error) ? 'Internal error' : error.message;
  return new TRPCError({ code, message, cause: error });
}
