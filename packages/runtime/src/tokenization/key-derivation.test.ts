import { describe, it, expect } from 'vitest';
import {
  deriveKeyHashes,
  normalizeAttributeName,
  normalizeAttributeValue,
  normalizeAttributes,
} from './key-derivation.js';

const keySets = [['mrn'], ['fullName', 'dateOfBirth']];

describe('normalization', () => {
  it('normalizes attribute names', () => {
    expect(normalizeAttributeName('date_of_birth')).toBe('dateofbirth');
    expect(normalizeAttributeName('Date-Of-Birth')).toBe('dateofbirth');
  });

  it('trims, collapses whitespace and lowercases values', () => {
    expect(normalizeAttributeValue('  Bruce \t  WAYNE ')).toBe('bruce wayne');
  });

  it('drops blank values', () => {
    expect(Array.from(normalizeAttributes({ mrn: '  ', fullName: 'Bruce' }))).toEqual([
      ['fullname', 'bruce'],
    ]);
  });
});

describe('deriveKeyHashes', () => {
  it('derives one hash per satisfied key set, in order', () => {
    const hashes = deriveKeyHashes(
      { mrn: 'MRN-1', fullName: 'Bruce Wayne', dateOfBirth: '1980-02-19' },
      keySets,
      'test-secret'
    );
    const mrnOnly = deriveKeyHashes({ mrn: 'MRN-1' }, keySets, 'test-secret');

    expect(hashes).toHaveLength(2);
    expect(hashes[0]).toBe(mrnOnly[0]);
    expect(hashes[0]).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is insensitive to formatting differences', () => {
    expect(deriveKeyHashes({ MRN: ' mrn-1 ' }, keySets, 'test-secret')).toEqual(
      deriveKeyHashes({ mrn: 'MRN-1' }, keySets, 'test-secret')
    );
  });

  it('depends on the secret', () => {
    expect(deriveKeyHashes({ mrn: 'MRN-1' }, keySets, 'test-secret')).not.toEqual(
      deriveKeyHashes({ mrn: 'MRN-1' }, keySets, 'other-secret')
    );
  });

  it('returns nothing when no key set is complete', () => {
    expect(deriveKeyHashes({ fullName: 'Bruce Wayne' }, keySets, 'test-secret')).toEqual([]);
  });
});
