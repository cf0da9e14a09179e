/**
 * CompText Registry — Registry
 *
 * The Registry is the validated, read-only catalog of bundles and profiles.
 *
 * Registry invariants:
 * - Constructed once from a validated document; never mutated afterwards.
 *   The instance, its definitions and its lists are frozen.
 * - Bundle insertion order is preserved. The matcher relies on it for
 *   tie-breaking (first registered wins).
 * - profileFor() is total: construction fails unless all three audience
 *   profiles are present.
 * - Hot reload replaces the whole instance (see RegistryHolder in
 *   @comptext/runtime-host); nothing swaps content inside an instance.
 */

import { Audience, ConfigurationError } from '@comptext/dsl';
import { contentHash } from './hash.js';
import type { BundleDefinition, ProfileDefinition, RegistryDocument } from './types.js';
import { RegistryValidator } from './validator.js';

export class Registry {
  /** SHA-256 of the canonical registry content. */
  readonly hash: string;

  private readonly bundles: ReadonlyArray<BundleDefinition>;
  private readonly bundlesById: ReadonlyMap<string, BundleDefinition>;
  private readonly profiles: Readonly<Record<Audience, ProfileDefinition>>;

  private constructor(
    bundles: ReadonlyArray<BundleDefinition>,
    profiles: Readonly<Record<Audience, ProfileDefinition>>,
  ) {
    this.bundles = Object.freeze([...bundles]);
    this.bundlesById = new Map(bundles.map((b) => [b.id, b]));
    this.profiles = Object.freeze({ ...profiles });
    this.hash = contentHash({
      profiles: Object.values(Audience).map((a) => profiles[a]),
      bundles,
    });
    Object.freeze(this);
  }

  /**
   * Build a Registry from an already-validated document.
   *
   * @throws {ConfigurationError} If an audience profile is missing
   */
  static fromDocument(document: RegistryDocument): Registry {
    const find = (audience: Audience): ProfileDefinition | undefined =>
      document.profiles.find((p) => p.audience === audience);

    const dev = find(Audience.Dev);
    const audit = find(Audience.Audit);
    const exec = find(Audience.Exec);
    if (dev === undefined || audit === undefined || exec === undefined) {
      throw new ConfigurationError([
        { message: 'Registry must declare profile.dev.v1, profile.audit.v1 and profile.exec.v1' },
      ]);
    }
    return new Registry(document.bundles, {
      [Audience.Dev]: dev,
      [Audience.Audit]: audit,
      [Audience.Exec]: exec,
    });
  }

  /** All bundles, in registration order. */
  listBundles(): ReadonlyArray<BundleDefinition> {
    return this.bundles;
  }

  getBundle(id: string): BundleDefinition | undefined {
    return this.bundlesById.get(id);
  }

  hasBundle(id: string): boolean {
    return this.bundlesById.has(id);
  }

  /** The profile bound to an audience. */
  profileFor(audience: Audience): ProfileDefinition {
    return this.profiles[audience];
  }

  /** Profiles in audience declaration order (dev, audit, exec). */
  listProfiles(): ReadonlyArray<ProfileDefinition> {
    return Object.values(Audience).map((a) => this.profiles[a]);
  }

  hasProfile(id: string): boolean {
    return this.listProfiles().some((p) => p.id === id);
  }

  /** True when `id` names a profile or a bundle of this registry. */
  has(id: string): boolean {
    return this.hasProfile(id) || this.hasBundle(id);
  }
}

/**
 * Validate a parsed registry document and construct the Registry.
 *
 * This is the startup gate: a malformed document never produces a
 * Registry.
 *
 * @param document - Parsed YAML/JSON content
 * @throws {ConfigurationError} Carrying every validation error
 */
export function createRegistry(document: unknown): Registry {
  const result = new RegistryValidator().validateDocument(document);
  if (!result.ok) {
    throw new ConfigurationError(result.errors);
  }
  return Registry.fromDocument(result.value);
}
