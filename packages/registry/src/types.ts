/**
 * CompText Registry — Definition Types
 *
 * Bundle and profile definitions as they exist after validation. Raw
 * registry documents (parsed YAML or JSON) are `unknown` until the
 * RegistryValidator accepts them.
 */

import type { Audience, ProfileId } from '@comptext/dsl';

/**
 * A pre-vetted bundle: matching metadata plus opaque expansion content.
 *
 * Immutable once loaded. `keywords` holds distinct entries (compared
 * case-insensitively) in source order.
 */
export interface BundleDefinition {
  /** Globally unique bundle identifier, e.g. `code.review.v1`. */
  readonly id: string;
  /** Human-readable name. Defaults to the id. */
  readonly name: string;
  /** Domain tag used for the domain bonus. Empty when the source omits it. */
  readonly domain: string;
  /** Task tag used for the task bonus. Empty when the source omits it. */
  readonly task: string;
  /** Non-empty list of non-empty keywords, matched case-insensitively. */
  readonly keywords: ReadonlyArray<string>;
  /** Passed through unchanged. The compiler never interprets it. */
  readonly expansion: unknown;
}

/** One of the three audience profiles. */
export interface ProfileDefinition {
  readonly id: ProfileId;
  readonly audience: Audience;
  readonly name: string;
  readonly expansion: unknown;
}

/**
 * A validated registry document: every profile and bundle in source order.
 */
export interface RegistryDocument {
  readonly profiles: ReadonlyArray<ProfileDefinition>;
  readonly bundles: ReadonlyArray<BundleDefinition>;
}
