// tRPC request context
//
// Creates the context available to all tRPC procedures: the services built
// at startup plus the calling system, taken from request headers.

import type { IncomingHttpHeaders } from 'node:http';
import type { CallerContext } from '@carechain/protocol';
import type { Services } from '../services.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  services: Services;

  /** The calling system (null if the caller headers are missing) */
  caller: CallerContext | null;
};

export type CreateContextOptions = {
  services: Services;
  headers: IncomingHttpHeaders;
};

export const CALLER_HEADERS = {
  id: 'x-caller-id',
  domain: 'x-caller-domain',
  purpose: 'x-caller-purpose',
} as const;

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read the caller from request headers. Partial or unknown values yield no
 * caller rather than a guessed one.
 */
export function getCallerFromHeaders(headers: IncomingHttpHeaders): CallerContext | null {
  const callerId = header(headers, CALLER_HEADERS.id);
  const domain = header(headers, CALLER_HEADERS.domain);
  const purpose = header(headers, CALLER_HEADERS.purpose);

  if (!callerId || !purpose) return null;
  if (domain !== 'hospital' && domain !== 'processing') return null;

  return { callerId, domain, purpose };
}

export function createContext(opts: CreateContextOptions): Context {
  return {
    services: opts.services,
    caller: getCallerFromHeaders(opts.headers),
  };
}
