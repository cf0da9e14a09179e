/**
 * CompText DSL — Parser
 *
 * Parses DSL text back into directives.
 *
 * Grammar (one directive per line):
 *   line      := 'use:' id (' ' delta)*
 *   id        := [A-Za-z0-9_.-]+
 *   delta     := '+' key '=' value
 *
 * The first directive must name a profile (`profile.*`); every later
 * directive names a bundle. Blank lines are skipped.
 *
 * Parser guarantees:
 * - Syntactic only: registry membership is checked by the caller.
 * - Rejecting: any error yields ParseError[], never a partial program.
 */

import type { Delta, Directive, ParseError, ParseResult } from './types.js';
import { parseDelta } from './render.js';

const ID_PATTERN = /^[A-Za-z0-9_.-]+$/;
const PROFILE_PREFIX = 'profile.';

interface LineParse {
  readonly directive?: Directive;
  readonly errors: ReadonlyArray<ParseError>;
}

function parseLine(raw: string, line: number): LineParse {
  const indent = raw.length - raw.trimStart().length;
  const text = raw.trim();

  if (!text.startsWith('use:')) {
    return {
      errors: [{ line, column: indent + 1, message: `Expected 'use:<id>', got ${JSON.stringify(text)}` }],
    };
  }

  const tokens = text.slice('use:'.length).split(/\s+/);
  const id = tokens[0] ?? '';
  if (!ID_PATTERN.test(id)) {
    return {
      errors: [{ line, column: indent + 5, message: `Invalid directive id ${JSON.stringify(id)}` }],
    };
  }

  const errors: ParseError[] = [];
  const deltas: Delta[] = [];
  // Column of each token, tracked against the trimmed line.
  let cursor = indent + 'use:'.length + id.length;
  for (const token of tokens.slice(1)) {
    const column = raw.indexOf(token, cursor) + 1;
    cursor = column - 1 + token.length;
    if (!token.startsWith('+')) {
      errors.push({ line, column, message: `Expected '+key=value', got ${JSON.stringify(token)}` });
      continue;
    }
    const parsed = parseDelta(token);
    if (parsed.ok) {
      deltas.push(parsed.value);
    } else {
      for (const e of parsed.errors) {
        errors.push({ line, column, message: e.message });
      }
    }
  }

  if (errors.length > 0) {
    return { errors };
  }
  return { directive: { id, deltas, line }, errors: [] };
}

/**
 * Parse a DSL text into its profile and bundle directives.
 *
 * @example
 * parseDsl('use:profile.dev.v1\nuse:code.review.v1 +depth=full')
 * // { ok: true, program: { profile: { id: 'profile.dev.v1', ... }, bundles: [{ id: 'code.review.v1', deltas: [{ key: 'depth', value: 'full' }], line: 2 }] } }
 */
export function parseDsl(source: string): ParseResult {
  const errors: ParseError[] = [];
  const directives: Directive[] = [];

  source.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === '') return;
    const parsed = parseLine(raw, index + 1);
    errors.push(...parsed.errors);
    if (parsed.directive !== undefined) {
      directives.push(parsed.directive);
    }
  });

  const [profile, ...bundles] = directives;
  if (errors.length === 0 && profile === undefined) {
    errors.push({ line: 1, column: 1, message: 'DSL is empty: expected a profile directive' });
  }
  if (profile !== undefined && !profile.id.startsWith(PROFILE_PREFIX)) {
    errors.push({
      line: profile.line,
      column: 1,
      message: `First directive must be a profile, got ${JSON.stringify(profile.id)}`,
    });
  }
  if (profile !== undefined && profile.deltas.length > 0) {
    errors.push({ line: profile.line, column: 1, message: 'Profile directives take no deltas' });
  }
  for (const bundle of bundles) {
    if (bundle.id.startsWith(PROFILE_PREFIX)) {
      errors.push({
        line: bundle.line,
        column: 1,
        message: `Only one profile directive is allowed, got ${JSON.stringify(bundle.id)}`,
      });
    }
  }

  if (errors.length > 0 || profile === undefined) {
    return { ok: false, errors };
  }
  return { ok: true, program: { profile, bundles } };
}
