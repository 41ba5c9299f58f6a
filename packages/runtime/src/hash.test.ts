import { describe, it, expect } from 'vitest';
import { canonicalJsonStringify, contentHash, hmacSha256Hex, sha256Hex } from './hash.js';

describe('canonicalJsonStringify', () => {
  it('sorts keys at every depth and keeps array order', () => {
    expect(canonicalJsonStringify({ b: 1, a: { d: [2, 1], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,1]},"b":1}'
    );
  });
});

describe('hashing', () => {
  it('hashes known input', () => {
    expect(sha256Hex('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('gives equal content the same hash regardless of key order', () => {
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
  });

  it('keys the hmac by secret', () => {
    expect(hmacSha256Hex('test-secret-a', 'x')).not.toBe(hmacSha256Hex('test-secret-b', 'x'));
    expect(hmacSha256Hex('test-secret-a', 'x')).toHaveLength(64);
  });
});
