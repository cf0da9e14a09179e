/**
 * CompText Runtime Host — ULID tests
 *
 *   ULID-1: 26 Crockford characters
 *   ULID-2: the first 10 encode the millisecond timestamp
 *   ULID-3: ids of later milliseconds sort after earlier ones
 */

import { describe, it, expect } from 'vitest';
import { ulid } from '../src/logging/ulid.js';

const CROCKFORD = /^[0-9A-HJKMNP-TV-Z]{26}$/;

describe('ulid', () => {
  it('ULID-1: produces 26 Crockford Base32 characters', () => {
    expect(ulid()).toMatch(CROCKFORD);
    expect(ulid()).not.toBe(ulid());
  });

  it('ULID-2: encodes the timestamp in the first 10 characters', () => {
    expect(ulid(0).slice(0, 10)).toBe('0000000000');
    expect(ulid(32).slice(0, 10)).toBe('0000000010');
    expect(ulid(1469918176385).slice(0, 10)).toBe('01ARYZ6S41');
  });

  it('ULID-3: sorts by time across milliseconds', () => {
    const earlier = ulid(1_767_225_600_000);
    const later = ulid(1_767_225_600_001);
    expect(earlier < later).toBe(true);
  });
});
