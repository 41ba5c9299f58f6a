// Token generation
//
// Tokens look like "batman_ab12cd34": a hero alias plus random hex.
// The alias is picked at random too, so nothing about the identity leaks.

import { randomBytes, randomInt } from 'node:crypto';
import { formatToken } from '@carechain/protocol';

export const TOKEN_ALIASES = [
  'batman',
  'superman',
  'wonderwoman',
  'spiderman',
  'ironman',
  'captainamerica',
  'thor',
  'hulk',
  'blackwidow',
  'hawkeye',
  'flash',
  'greenlantern',
  'aquaman',
  'cyborg',
  'greenarrow',
  'blackpanther',
  'doctorstrange',
  'antman',
  'wasp',
  'falcon',
  'wintersoldier',
  'scarletwitch',
  'vision',
  'warmachine',
  'deadpool',
] as const;

export interface TokenGenerator {
  next(): string;
}

/**
 * Cryptographically random tokens.
 *
 * @param suffixBytes - random bytes in the hex suffix (default 4, i.e. 8 hex chars)
 */
export function createRandomTokenGenerator(suffixBytes = 4): TokenGenerator {
  return {
    next() {
      const alias = TOKEN_ALIASES[randomInt(TOKEN_ALIASES.length)];
      return formatToken(alias, randomBytes(suffixBytes).toString('hex'));
    },
  };
}

/**
 * Hands out the given tokens in order, then throws. For tests.
 */
export function createSequenceTokenGenerator(tokens: string[]): TokenGenerator {
  let index = 0;
  return {
    next() {
      if (index >= tokens.length) {
        throw new Error('Token sequence exhausted');
      }
      return tokens[index++];
    },
  };
}
