// Input envelope types - the identity-free unit handed to the agent pipeline

import type { Id, Timestamp } from './common.js';

/**
 * Normalized message from a channel adapter.
 * Adapters decode their provider's protocol before handing off.
 */
export type RawMessage = {
  /** Provider-side sender reference (phone number, user id, ...) */
  senderRef: string;
  body?: string;
  mediaLocator?: string;
  mediaType?: string;
  mediaSize?: number;
};

export type InputType = 'text' | 'image' | 'video' | 'mixed';

export type RawContentRefs = {
  body: string | null;
  mediaLocator: string | null;
  mediaType: string | null;
};

export type EnvelopeMetadata = {
  /** MIME type of the media, or "text/plain" for text-only messages */
  format: string;

  /** UTF-8 body bytes plus media bytes */
  byteSize: number;

  /** SHA-256 over the canonical content refs */
  checksum: string;

  hasMedia: boolean;
  hasText: boolean;
};

export type EnvelopeAuditTrail = {
  /** One-way keyed hash of the sender reference */
  senderHash: string;
  processingId: Id;
  receivedAt: Timestamp;
};

/**
 * Identity-free envelope produced by the isolated input layer.
 * `sessionId` correlates one message exchange; it is never a patient identifier.
 */
export type InputEnvelope = {
  sessionId: string;
  timestamp: Timestamp;
  inputType: InputType;
  rawContentRefs: RawContentRefs;
  metadata: EnvelopeMetadata;
  auditTrail: EnvelopeAuditTrail;
};
