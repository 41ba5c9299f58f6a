// Identity key derivation
//
// Each configured key set (e.g. ["mrn"] or ["fullName", "dateOfBirth"]) that
// the attributes fully satisfy yields one key hash: HMAC-SHA256 over the
// canonical form of the set's normalized names and values.

import type { IdentityAttributes } from '@carechain/protocol';
import { canonicalJsonStringify, hmacSha256Hex } from '../hash.js';

/**
 * Lowercase and strip everything but letters and digits, so "date_of_birth",
 * "dateOfBirth" and "Date-Of-Birth" name the same attribute.
 */
export function normalizeAttributeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Trim, collapse internal whitespace, lowercase.
 */
export function normalizeAttributeValue(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Normalize attribute names and values. Blank values are dropped.
 * When two names normalize to the same key, the first non-blank value wins.
 */
export function normalizeAttributes(attributes: IdentityAttributes): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [name, value] of Object.entries(attributes)) {
    const key = normalizeAttributeName(name);
    const normalizedValue = normalizeAttributeValue(value);
    if (key === '' || normalizedValue === '' || normalized.has(key)) continue;
    normalized.set(key, normalizedValue);
  }
  return normalized;
}

/**
 * Derive one key hash per satisfied key set, in key-set order, without duplicates.
 * An empty result means the attributes identify nobody.
 */
export function deriveKeyHashes(
  attributes: IdentityAttributes,
  keySets: string[][],
  secret: string
): string[] {
  const normalized = normalizeAttributes(attributes);
  const hashes: string[] = [];

  for (const keySet of keySets) {
    const names = Array.from(new Set(keySet.map(normalizeAttributeName))).sort();
    const values: string[] = [];
    for (const name of names) {
      const value = normalized.get(name);
      if (value === undefined) break;
      values.push(value);
    }
    if (values.length !== names.length) continue;

    const hash = hmacSha256Hex(secret, canonicalJsonStringify({ names, values }));
    if (!hashes.includes(hash)) hashes.push(hash);
  }

  return hashes;
}

/**
 * Normalized attribute names present in both sets with different values.
 */
export function findAttributeConflicts(a: IdentityAttributes, b: IdentityAttributes): string[] {
  const left = normalizeAttributes(a);
  const right = normalizeAttributes(b);
  const conflicts: string[] = [];
  for (const [name, value] of left) {
    const other = right.get(name);
    if (other !== undefined && other !== value) conflicts.push(name);
  }
  return conflicts.sort();
}

/**
 * Stored attributes plus the incoming ones they lack. Stored values win,
 * so callers check for conflicts first.
 */
export function mergeAttributes(
  stored: IdentityAttributes,
  incoming: IdentityAttributes
): IdentityAttributes {
  const known = normalizeAttributes(stored);
  const merged: IdentityAttributes = { ...stored };
  for (const [name, value] of Object.entries(incoming)) {
    const key = normalizeAttributeName(name);
    if (key === '' || normalizeAttributeValue(value) === '' || known.has(key)) continue;
    known.set(key, normalizeAttributeValue(value));
    merged[name] = value;
  }
  return merged;
}
