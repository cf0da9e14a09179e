/**
 * CompText Runtime Host — ULID
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of cryptographic randomness. Used as
 * `event_id` on compile-log lines so that merged or re-synced log files can
 * be deduplicated on read.
 *
 * Within one millisecond the random part is not incremented, so ordering
 * between ids of the same millisecond is arbitrary.
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Crockford characters, zero-padded. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param now - Millisecond timestamp. Default: Date.now()
 */
export function ulid(now: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
