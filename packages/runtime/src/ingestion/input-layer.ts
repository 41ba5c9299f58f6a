// Isolated input layer - the entry point for every inbound message
//
// Syntactic checks only: shape, non-empty content, media type, size. The
// layer never interprets text or media and never learns who the sender is;
// the sender reference leaves here only as a keyed hash.

import { randomUUID } from 'node:crypto';
import type { InputEnvelope, InputType, RawMessage } from '@carechain/protocol';
import { DeliveryFailedError, ValidationError } from '../errors.js';
import { contentHash, hmacSha256Hex } from '../hash.js';
import { silentLogger, describeError, type Logger } from '../logger.js';
import { retryWithBackoff, type RetrySettings } from '../retry.js';
import type { EnvelopeQueue } from './queue.js';

export type ReceiveResult =
  | { status: 'accepted'; envelope: InputEnvelope }
  | { status: 'rejected'; error: ValidationError }
  | { status: 'delivery_failed'; envelope: InputEnvelope; error: DeliveryFailedError };

export type InputLayerOptions = {
  queue: EnvelopeQueue;
  senderHashSecret: string;
  maxPayloadBytes: number;
  supportedMediaTypes: string[];
  retry: RetrySettings;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
};

export interface InputLayer {
  /**
   * Validate a raw message and enqueue its envelope.
   * Never throws for bad input; the outcome is in the result.
   */
  receive(message: unknown): Promise<ReceiveResult>;
}

/**
 * Lowercased MIME type without parameters ("image/JPEG; q=1" -> "image/jpeg").
 */
export function normalizeMediaType(mediaType: string): string {
  return mediaType.split(';')[0].trim().toLowerCase();
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError('malformed_message', { field });
  }
  return value;
}

/**
 * Check the message shape and return it typed.
 */
export function parseRawMessage(message: unknown): RawMessage {
  if (!message || typeof message !== 'object' || Array.isArray(message)) {
    throw new ValidationError('malformed_message');
  }
  const m: Record<string, unknown> = { ...message };

  const senderRef = m.senderRef;
  if (typeof senderRef !== 'string' || senderRef.trim() === '') {
    throw new ValidationError('malformed_message', { field: 'senderRef' });
  }

  const body = optionalString(m.body, 'body');
  const mediaLocator = optionalString(m.mediaLocator, 'mediaLocator');
  const mediaType = optionalString(m.mediaType, 'mediaType');

  let mediaSize: number | undefined;
  const rawSize = m.mediaSize;
  if (rawSize !== undefined && rawSize !== null) {
    if (typeof rawSize !== 'number' || !Number.isSafeInteger(rawSize) || rawSize < 0) {
      throw new ValidationError('malformed_message', { field: 'mediaSize' });
    }
    mediaSize = rawSize;
  }

  const hasLocator = mediaLocator !== undefined && mediaLocator.trim() !== '';
  const hasType = mediaType !== undefined && mediaType.trim() !== '';
  if (hasLocator !== hasType || (mediaSize !== undefined && !hasLocator)) {
    throw new ValidationError('malformed_message', { field: 'media' });
  }
  // The size limit is enforced on the declared size, so media must declare one.
  if (hasLocator && mediaSize === undefined) {
    throw new ValidationError('malformed_message', { field: 'mediaSize' });
  }

  return {
    senderRef,
    body,
    mediaLocator: hasLocator ? mediaLocator : undefined,
    mediaType: hasType ? mediaType : undefined,
    mediaSize,
  };
}

function inputTypeOf(hasText: boolean, mediaType: string | undefined): InputType {
  if (mediaType === undefined) return 'text';
  if (hasText) return 'mixed';
  return mediaType.startsWith('video/') ? 'video' : 'image';
}

/**
 * Create the input layer.
 *
 * @example
 * ```typescript
 * const input = createInputLayer({
 *   queue,
 *   senderHashSecret: config.senderHashSecret,
 *   maxPayloadBytes: config.maxPayloadBytes,
 *   supportedMediaTypes: config.supportedMediaTypes,
 *   retry: config.retry,
 * });
 *
 * const result = await input.receive({ senderRef: 'whatsapp:+15550000000', body: 'hello' });
 * ```
 */
export function createInputLayer(options: InputLayerOptions): InputLayer {
  const { queue, senderHashSecret, maxPayloadBytes, retry } = options;
  const supported = new Set(options.supportedMediaTypes.map(normalizeMediaType));
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? randomUUID;

  function buildEnvelope(message: RawMessage): InputEnvelope {
    const hasText = message.body !== undefined && message.body.trim() !== '';
    const hasMedia = message.mediaLocator !== undefined;

    if (!hasText && !hasMedia) {
      throw new ValidationError('empty_content');
    }

    const format = message.mediaType !== undefined ? normalizeMediaType(message.mediaType) : undefined;
    if (format !== undefined && !supported.has(format)) {
      throw new ValidationError('unsupported_media_type', { field: 'mediaType' });
    }

    const byteSize = Buffer.byteLength(message.body ?? '', 'utf8') + (message.mediaSize ?? 0);
    if (byteSize > maxPayloadBytes) {
      throw new ValidationError('payload_too_large', { details: { byteSize, maxPayloadBytes } });
    }

    const contentRefs = {
      body: message.body ?? null,
      mediaLocator: message.mediaLocator ?? null,
      mediaType: message.mediaType ?? null,
    };
    const receivedAt = now().toISOString();

    return {
      sessionId: `session_${generateId()}`,
      timestamp: receivedAt,
      inputType: inputTypeOf(hasText, format),
      rawContentRefs: contentRefs,
      metadata: {
        format: format ?? 'text/plain',
        byteSize,
        checksum: contentHash({ ...contentRefs, mediaSize: message.mediaSize ?? null }),
        hasMedia,
        hasText,
      },
      auditTrail: {
        senderHash: hmacSha256Hex(senderHashSecret, message.senderRef),
        processingId: generateId(),
        receivedAt,
      },
    };
  }

  return {
    async receive(message) {
      let envelope: InputEnvelope;
      try {
        envelope = buildEnvelope(parseRawMessage(message));
      } catch (error) {
        if (error instanceof ValidationError) {
          logger.info('Message rejected', { reason: error.reason });
          return { status: 'rejected', error };
        }
        throw error;
      }

      try {
        await retryWithBackoff(() => queue.enqueue(envelope), {
          ...retry,
          onRetry: (error, attempt, delayMs) => {
            logger.warn('Enqueue failed, retrying', {
              sessionId: envelope.sessionId,
              attempt,
              delayMs,
              ...describeError(error),
            });
          },
        });
      } catch (error) {
        logger.error('Envelope delivery failed', {
          sessionId: envelope.sessionId,
          ...describeError(error),
        });
        return {
          status: 'delivery_failed',
          envelope,
          error: new DeliveryFailedError(envelope.sessionId, retry.maxAttempts, error),
        };
      }

      logger.info('Envelope accepted', {
        sessionId: envelope.sessionId,
        inputType: envelope.inputType,
        byteSize: envelope.metadata.byteSize,
      });
      return { status: 'accepted', envelope };
    },
  };
}
