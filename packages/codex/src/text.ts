/**
 * CompText Codex — Text helpers
 */

import { CodexQueryError } from './errors.js';

export const MAX_QUERY_LENGTH = 200;

// C0 controls except tab (0x09) and newline (0x0A).
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B-\u001F]/g;

/** Strip control characters, keeping newlines and tabs. */
export function sanitizeText(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '');
}

/**
 * Shorten `text` to at most `maxLength` characters, ending in `suffix` when
 * anything was cut. A limit shorter than the suffix keeps only its start.
 */
export function truncateText(text: string, maxLength = 1000, suffix = '...'): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= suffix.length) return suffix.slice(0, Math.max(0, maxLength));
  return text.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Trim a search query and check its bounds.
 *
 * @throws {CodexQueryError} If the query is blank or longer than MAX_QUERY_LENGTH
 */
export function validateQuery(query: string): string {
  const trimmed = query.trim();
  if (trimmed === '') {
    throw new CodexQueryError('Query string cannot be empty');
  }
  if (trimmed.length > MAX_QUERY_LENGTH) {
    throw new CodexQueryError(`Query too long (max ${MAX_QUERY_LENGTH} characters)`);
  }
  return trimmed;
}
