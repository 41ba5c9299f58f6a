// Identity blob encryption
//
// AES-256-GCM with a key stretched from the configured secret via scrypt.
// Envelope: v1:<iv>:<tag>:<ciphertext>, each part base64.

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import type { IdentityAttributes } from '@carechain/protocol';

const VERSION = 'v1';
const ALGORITHM = 'aes-256-gcm';
const IV_BYTES = 12;
const KEY_SALT = 'carechain.identity-blob.v1';

export interface IdentityCipher {
  encrypt(attributes: IdentityAttributes): string;
  decrypt(blob: string): IdentityAttributes;
}

/**
 * Error for blobs that cannot be decrypted (wrong key, tampering, unknown version).
 */
export class IdentityBlobError extends Error {
  readonly code = 'IDENTITY_BLOB_INVALID';

  constructor(reason: string) {
    super(`Identity blob cannot be decrypted: ${reason}`);
    this.name = 'IdentityBlobError';
  }
}

function isStringRecord(value: unknown): value is IdentityAttributes {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

export function createIdentityCipher(secret: string): IdentityCipher {
  const key = scryptSync(secret, KEY_SALT, 32);

  return {
    encrypt(attributes) {
      const iv = randomBytes(IV_BYTES);
      const cipher = createCipheriv(ALGORITHM, key, iv);
      const ciphertext = Buffer.concat([
        cipher.update(JSON.stringify(attributes), 'utf8'),
        cipher.final(),
      ]);
      const tag = cipher.getAuthTag();

      return [VERSION, iv.toString('base64'), tag.toString('base64'), ciphertext.toString('base64')].join(
        ':'
      );
    },

    decrypt(blob) {
      const parts = blob.split(':');
      if (parts.length !== 4 || parts[0] !== VERSION) {
        throw new IdentityBlobError('unknown envelope format');
      }

      const [, iv, tag, ciphertext] = parts.map((part) => Buffer.from(part, 'base64'));

      let plaintext: string;
      try {
        const decipher = createDecipheriv(ALGORITHM, key, iv);
        decipher.setAuthTag(tag);
        plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
      } catch {
        throw new IdentityBlobError('authentication failed');
      }

      const parsed: unknown = JSON.parse(plaintext);
      if (!isStringRecord(parsed)) {
        throw new IdentityBlobError('unexpected payload');
      }
      return parsed;
    },
  };
}
