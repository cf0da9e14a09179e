/**
 * CompText DSL — Parser Tests
 *
 * parser/accepts: rendered DSL parses back into its directives
 * parser/positions: errors carry 1-based line and column
 * parser/structure: profile first, exactly one profile
 */

import { describe, it, expect } from 'vitest';
import { parseDsl } from '../src/parser.js';

describe('parseDsl: accepts canonical DSL', () => {
  it('parses a profile and a bundle directive', () => {
    const result = parseDsl('use:profile.dev.v1\nuse:code.review.v1');
    expect(result).toEqual({
      ok: true,
      program: {
        profile: { id: 'profile.dev.v1', deltas: [], line: 1 },
        bundles: [{ id: 'code.review.v1', deltas: [], line: 2 }],
      },
    });
  });

  it('parses deltas on a bundle line', () => {
    const result = parseDsl('use:profile.dev.v1\nuse:code.perfopt.v1 +benchmark=full +compare=baseline');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.program.bundles[0]?.deltas).toEqual([
      { key: 'benchmark', value: 'full' },
      { key: 'compare', value: 'baseline' },
    ]);
  });

  it('skips blank lines and a trailing newline', () => {
    const result = parseDsl('use:profile.exec.v1\n\nuse:docs.api.v1\n');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.program.bundles.map((b) => b.id)).toEqual(['docs.api.v1']);
    expect(result.program.bundles[0]?.line).toBe(3);
  });

  it('accepts a program with only a profile directive', () => {
    const result = parseDsl('use:profile.audit.v1');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.program.bundles).toHaveLength(0);
  });
});

describe('parseDsl: error positions', () => {
  it('reports a line that does not start with use:', () => {
    const result = parseDsl('use:profile.dev.v1\nrun:code.review.v1');
    expect(result).toEqual({
      ok: false,
      errors: [{ line: 2, column: 1, message: `Expected 'use:<id>', got "run:code.review.v1"` }],
    });
  });

  it('reports the column of a malformed delta token', () => {
    const result = parseDsl('use:profile.dev.v1\nuse:a.v1 depth');
    expect(result).toEqual({
      ok: false,
      errors: [{ line: 2, column: 10, message: `Expected '+key=value', got "depth"` }],
    });
  });

  it('reports an empty program', () => {
    expect(parseDsl('')).toEqual({
      ok: false,
      errors: [{ line: 1, column: 1, message: 'DSL is empty: expected a profile directive' }],
    });
  });
});

describe('parseDsl: structure', () => {
  it('rejects a bundle in first position', () => {
    const result = parseDsl('use:code.review.v1');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0]?.message).toBe('First directive must be a profile, got "code.review.v1"');
  });

  it('rejects a second profile directive', () => {
    const result = parseDsl('use:profile.dev.v1\nuse:profile.exec.v1');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors[0]?.line).toBe(2);
  });

  it('rejects deltas on the profile directive', () => {
    const result = parseDsl('use:profile.dev.v1 +x=1');
    expect(result.ok).toBe(false);
  });
});
