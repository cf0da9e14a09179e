/**
 * CompText Compiler — Closed-world DSL check
 *
 * Parses DSL text and verifies that every id it names exists in the
 * registry. Compiler output always passes; hand-written or stored DSL may
 * not.
 */

import {
  parseDsl,
  type DslProgram,
  type ValidationError,
  type ValidationResult,
} from '@comptext/dsl';
import type { Registry } from '@comptext/registry';

/**
 * Check a DSL text against a registry.
 *
 * @returns the parsed program when every id is registered; otherwise the
 *   parse errors, or every unregistered id
 */
export function checkDsl(source: string, registry: Registry): ValidationResult<DslProgram> {
  const parsed = parseDsl(source);
  if (!parsed.ok) {
    return {
      ok: false,
      errors: parsed.errors.map((e) => ({
        message: e.message,
        context: `line ${e.line}, column ${e.column}`,
      })),
    };
  }

  const { profile, bundles } = parsed.program;
  const errors: ValidationError[] = [];
  if (!registry.hasProfile(profile.id)) {
    errors.push({ message: `Unknown profile: "${profile.id}"`, context: `line ${profile.line}` });
  }
  for (const bundle of bundles) {
    if (!registry.hasBundle(bundle.id)) {
      errors.push({ message: `Unknown bundle: "${bundle.id}"`, context: `line ${bundle.line}` });
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: parsed.program };
}
