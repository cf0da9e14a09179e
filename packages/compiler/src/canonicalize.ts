/**
 * CompText Compiler — Canonicalizer
 *
 * Renders registry ids into canonical DSL, enforcing the closed world:
 * every id written to the output exists in the registry. An unknown id is
 * a programming defect, never a consequence of user text, and raises
 * InvariantViolation.
 *
 * Line layout and delta ordering are owned by renderDsl in @comptext/dsl.
 */

import { type Audience, type Delta, InvariantViolation, renderDsl } from '@comptext/dsl';
import type { Registry } from '@comptext/registry';

/**
 * Render the profile line for `audience` followed by one line per bundle.
 *
 * @throws {InvariantViolation} If a bundle id is not registered, or a delta
 *   cannot be rendered
 */
export function canonicalize(
  registry: Registry,
  audience: Audience,
  bundleIds: ReadonlyArray<string>,
  deltas: ReadonlyArray<Delta> = [],
): string {
  for (const id of bundleIds) {
    if (!registry.hasBundle(id)) {
      throw new InvariantViolation(`bundle ${JSON.stringify(id)} is not in the registry`);
    }
  }
  const profile = registry.profileFor(audience);
  return renderDsl(profile.id, bundleIds, deltas);
}
