/**
 * CompText Registry — Content hashing
 *
 * SHA-256 over a canonical JSON rendering of the registry content. Object
 * keys are sorted at every level; array order is kept, so bundle insertion
 * order (which decides tie-breaks) is part of the identity.
 */

import { createHash } from 'node:crypto';

/**
 * Produces a canonical JSON string with deterministic key ordering.
 *
 * JSON.stringify keeps insertion order, which differs between two documents
 * that carry the same content. Sorting keys makes the output depend on
 * content only.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item: unknown) => canonicalize(item)).join(',') + ']';
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
  }
  // bigint, symbol, function: not representable in registry documents.
  return 'null';
}

/** SHA-256 hex digest of the canonical form of `value`. */
export function contentHash(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}
