// Token format
//
// Tokens look like "<alias>_<hex>": a lowercase alias word followed by
// at least 8 hex characters of randomness, e.g. "batman_ab12cd34".

/**
 * Token pattern. Anything with spaces, digits-only strings, dates or
 * punctuation (names, MRNs, phone numbers) fails it.
 */
export const TOKEN_PATTERN = /^[a-z][a-z0-9]{1,31}_[0-9a-f]{8,64}$/;

/**
 * Check whether a value is a well-formed opaque token.
 */
export function isValidToken(value: unknown): value is string {
  return typeof value === 'string' && TOKEN_PATTERN.test(value);
}

/**
 * Normalize an alias word to the token alphabet ("Wonder Woman" -> "wonderwoman").
 * Returns null when nothing usable is left.
 */
export function normalizeTokenAlias(alias: string): string | null {
  const normalized = alias.toLowerCase().replace(/[^a-z0-9]/g, '').slice(0, 32);
  if (!/^[a-z][a-z0-9]+$/.test(normalized)) {
    return null;
  }
  return normalized;
}

/**
 * Build a token from an alias and a hex suffix.
 * @throws Error if the result does not match TOKEN_PATTERN
 */
export function formatToken(alias: string, hexSuffix: string): string {
  const normalized = normalizeTokenAlias(alias);
  const token = `${normalized ?? 'patient'}_${hexSuffix.toLowerCase()}`;
  if (!TOKEN_PATTERN.test(token)) {
    throw new Error('Generated token does not match the token format');
  }
  return token;
}
