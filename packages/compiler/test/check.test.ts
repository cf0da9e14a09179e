/**
 * CompText Compiler — Closed-world DSL check
 */

import { describe, it, expect } from 'vitest';
import { checkDsl } from '../src/check.js';
import { codeRegistry } from './fixtures.js';

describe('checkDsl', () => {
  it('accepts DSL that names registered ids', () => {
    const result = checkDsl('use:profile.audit.v1\nuse:code.review.v1 +depth=full', codeRegistry());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bundles[0]?.deltas).toEqual([{ key: 'depth', value: 'full' }]);
  });

  it('reports every unregistered bundle with its line', () => {
    const result = checkDsl(
      'use:profile.dev.v1\nuse:code.ghost.v1\nuse:code.review.v1\nuse:docs.ghost.v1',
      codeRegistry(),
    );
    expect(result).toEqual({
      ok: false,
      errors: [
        { message: 'Unknown bundle: "code.ghost.v1"', context: 'line 2' },
        { message: 'Unknown bundle: "docs.ghost.v1"', context: 'line 4' },
      ],
    });
  });

  it('passes parse errors through with their position', () => {
    const result = checkDsl('use:code.review.v1', codeRegistry());
    expect(result).toEqual({
      ok: false,
      errors: [
        {
          message: 'First directive must be a profile, got "code.review.v1"',
          context: 'line 1, column 1',
        },
      ],
    });
  });

  it('rejects an unrecognized profile', () => {
    const result = checkDsl('use:profile.ops.v1\nuse:code.review.v1', codeRegistry());
    expect(result).toEqual({
      ok: false,
      errors: [{ message: 'Unknown profile: "profile.ops.v1"', context: 'line 1' }],
    });
  });
});
