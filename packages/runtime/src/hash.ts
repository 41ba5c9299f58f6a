import { createHash, createHmac } from 'node:crypto';

/** SHA-256 of a UTF-8 string, hex encoded. */
export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

/** HMAC-SHA256 of a UTF-8 string under `secret`, hex encoded. */
export function hmacSha256Hex(secret: string, data: string): string {
  return createHmac('sha256', secret).update(data, 'utf8').digest('hex');
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Used for deterministic hashing of nested objects.
 */
export function canonicalJsonStringify(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value));
}

function sortKeysDeep(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(sortKeysDeep);
  const sorted: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = sortKeysDeep(child);
  }
  return sorted;
}

/** SHA-256 of the canonical JSON form of a value. */
export function contentHash(value: unknown): string {
  return sha256Hex(canonicalJsonStringify(value));
}
