/**
 * Loadout Runtime Host — ULID Generator
 *
 * 26 characters of Crockford Base32: a 48-bit millisecond timestamp (10
 * chars) followed by 80 random bits (16 chars). Used as `event_id` on every
 * acquisition log line so that readLog() can drop duplicated lines when
 * several processes append to the same file.
 *
 * Randomness is not incremented within a millisecond, so two ids from the
 * same millisecond sort arbitrarily relative to each other.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32: no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

/**
 * @param now - Millisecond timestamp for the time component
 * @example ulid() // '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  const random = BigInt('0x' + randomBytes(10).toString('hex'));
  return encode(BigInt(now), 10) + encode(random, 16);
}
