// Technical replies to senders
//
// Channel adapters answer the sender with one of these texts. They describe
// format problems only and carry no medical content.

import type { ValidationReason } from '../errors.js';
import type { ReceiveResult } from './input-layer.js';

const FORMAT_HELP = 'Accepted formats: JPG, PNG, WEBP images and MP4, MOV, AVI videos.';

const REJECTION_REPLIES: Partial<Record<ValidationReason, string>> = {
  malformed_message: 'Your message could not be read. Please send it again.',
  empty_content: 'Your message was empty. Please send a text or an image.',
  unsupported_media_type: `The attached file type is not supported. ${FORMAT_HELP}`,
  payload_too_large: 'The attached file is too large. Please reduce its size and send it again.',
};

const RECEIVED_REPLY = 'Your message has been received and will be reviewed.';

const TECHNICAL_FAILURE_REPLY =
  'A technical problem occurred while processing your message. Please try again in a few minutes.';

/**
 * Reply text for the outcome of `receive`.
 */
export function technicalReply(result: ReceiveResult): string {
  switch (result.status) {
    case 'accepted':
      return RECEIVED_REPLY;
    case 'rejected':
      return REJECTION_REPLIES[result.error.reason] ?? TECHNICAL_FAILURE_REPLY;
    case 'delivery_failed':
      return TECHNICAL_FAILURE_REPLY;
  }
}
