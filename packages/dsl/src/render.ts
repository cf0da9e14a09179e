/**
 * CompText DSL — Canonical renderer
 *
 * Renders a profile id and bundle ids into the canonical DSL text.
 *
 * Renderer guarantees:
 * - Fixed line order: the profile line first, then one line per bundle.
 * - No blank lines inside the body.
 * - Deltas are sorted by key, then value, so the caller's ordering never
 *   changes the output.
 * - Identical input produces byte-identical output.
 *
 * The renderer does not know the registry. Callers that render registry ids
 * check membership first (see the compiler's canonicalizer).
 */

import type { Delta, ValidationResult } from './types.js';
import { InvariantViolation } from './types.js';

const DELTA_KEY_PATTERN = /^[A-Za-z0-9_.-]+$/;
const DELTA_VALUE_PATTERN = /^\S+$/;

/** Compare deltas by key, then value (code-unit order, locale independent). */
function compareDeltas(a: Delta, b: Delta): number {
  if (a.key !== b.key) return a.key < b.key ? -1 : 1;
  if (a.value !== b.value) return a.value < b.value ? -1 : 1;
  return 0;
}

/**
 * Render one delta as its `+key=value` token.
 *
 * @throws {InvariantViolation} If the key or value cannot be rendered.
 *   User-supplied deltas must pass parseDelta() before reaching here.
 */
export function formatDelta(delta: Delta): string {
  if (!DELTA_KEY_PATTERN.test(delta.key)) {
    throw new InvariantViolation(`delta key ${JSON.stringify(delta.key)} is not renderable`);
  }
  if (!DELTA_VALUE_PATTERN.test(delta.value)) {
    throw new InvariantViolation(`delta value ${JSON.stringify(delta.value)} is not renderable`);
  }
  return `+${delta.key}=${delta.value}`;
}

/**
 * Parse a `key=value` string (an optional leading `+` is accepted) into a
 * Delta.
 */
export function parseDelta(source: string): ValidationResult<Delta> {
  const trimmed = source.trim().replace(/^\+/, '');
  const eq = trimmed.indexOf('=');
  if (eq <= 0) {
    return {
      ok: false,
      errors: [{ message: `Expected key=value, got ${JSON.stringify(source)}` }],
    };
  }
  const key = trimmed.slice(0, eq);
  const value = trimmed.slice(eq + 1);
  if (!DELTA_KEY_PATTERN.test(key)) {
    return {
      ok: false,
      errors: [{ message: `Invalid delta key ${JSON.stringify(key)}: use letters, digits, '_', '.', '-'` }],
    };
  }
  if (!DELTA_VALUE_PATTERN.test(value)) {
    return {
      ok: false,
      errors: [{ message: `Invalid delta value for ${key}: must be non-empty without whitespace` }],
    };
  }
  return { ok: true, value: { key, value } };
}

/**
 * Render canonical CompText DSL.
 *
 * @example
 * renderDsl('profile.dev.v1', ['code.review.v1'])
 * // 'use:profile.dev.v1\nuse:code.review.v1'
 *
 * renderDsl('profile.dev.v1', ['code.perfopt.v1'], [{ key: 'compare', value: 'baseline' }, { key: 'benchmark', value: 'full' }])
 * // 'use:profile.dev.v1\nuse:code.perfopt.v1 +benchmark=full +compare=baseline'
 */
export function renderDsl(
  profileId: string,
  bundleIds: ReadonlyArray<string>,
  deltas: ReadonlyArray<Delta> = [],
): string {
  const suffix = [...deltas].sort(compareDeltas).map(formatDelta).join(' ');
  const lines: string[] = [`use:${profileId}`];
  for (const bundleId of bundleIds) {
    lines.push(suffix === '' ? `use:${bundleId}` : `use:${bundleId} ${suffix}`);
  }
  return lines.join('\n');
}
