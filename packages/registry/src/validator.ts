/**
 * CompText Registry — Document Validator
 *
 * Validates a parsed registry document (from YAML or JSON) and normalizes it
 * into definitions.
 *
 * Every error in the document is collected before returning, so one
 * validation pass reports the whole set of configuration defects:
 * - bundle ids must be non-empty strings, unique across the registry
 * - `match.keywords_any` must be a non-empty list of non-empty strings
 * - `domain`, `task` and `name` must be strings when present
 * - profile ids must be one of the recognised profile ids, each declared once
 * - all three profiles must be declared
 */

import {
  Audience,
  PROFILE_ID_BY_AUDIENCE,
  PROFILE_IDS,
  type ProfileId,
  type ValidationError,
  type ValidationResult,
} from '@comptext/dsl';
import type { BundleDefinition, ProfileDefinition, RegistryDocument } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy an opaque expansion value and freeze every array and mapping in it.
 * The caller's document is left untouched.
 */
function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => frozenCopy(item)));
  }
  if (isRecord(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = frozenCopy(item);
    }
    return Object.freeze(copy);
  }
  return value;
}

function isProfileId(value: string): value is ProfileId {
  return PROFILE_IDS.some((id) => id === value);
}

function audienceOf(profileId: ProfileId): Audience {
  for (const audience of Object.values(Audience)) {
    if (PROFILE_ID_BY_AUDIENCE[audience] === profileId) {
      return audience;
    }
  }
  // PROFILE_ID_BY_AUDIENCE covers every ProfileId.
  return Audience.Dev;
}

/** Read an optional string field. Records an error when present with another type. */
function optionalString(
  entry: Record<string, unknown>,
  field: string,
  context: string,
  errors: ValidationError[],
): string | undefined {
  const value = entry[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push({ message: `Field "${field}" must be a string`, context });
    return undefined;
  }
  return value;
}

/**
 * Validates registry documents.
 */
export class RegistryValidator {
  /**
   * Validate an unknown value as a registry document.
   *
   * @param document - Parsed YAML/JSON content
   * @returns the normalized document on success, every error on failure
   */
  validateDocument(document: unknown): ValidationResult<RegistryDocument> {
    if (!isRecord(document)) {
      return {
        ok: false,
        errors: [{ message: 'Registry document must be a mapping with "profiles" and "bundles"' }],
      };
    }

    const errors: ValidationError[] = [];
    const profiles = this.validateProfiles(document['profiles'], errors);
    const bundles = this.validateBundles(document['bundles'], errors);

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: { profiles, bundles } };
  }

  private validateProfiles(raw: unknown, errors: ValidationError[]): ProfileDefinition[] {
    const profiles: ProfileDefinition[] = [];
    if (raw !== undefined && raw !== null && !Array.isArray(raw)) {
      errors.push({ message: '"profiles" must be a list' });
      return profiles;
    }
    const entries: ReadonlyArray<unknown> = Array.isArray(raw) ? raw : [];
    const seen = new Set<string>();

    entries.forEach((entry, index) => {
      const context = `profiles[${index}]`;
      if (!isRecord(entry)) {
        errors.push({ message: 'Profile entry must be a mapping', context });
        return;
      }
      const id = entry['id'];
      if (typeof id !== 'string' || id.trim() === '') {
        errors.push({ message: 'Profile id must be a non-empty string', context });
        return;
      }
      if (!isProfileId(id)) {
        errors.push({
          message: `Unrecognized profile id: "${id}". Must be one of: ${PROFILE_IDS.join(', ')}`,
          context,
        });
        return;
      }
      if (seen.has(id)) {
        errors.push({ message: `Duplicate profile id: "${id}"`, context });
        return;
      }
      seen.add(id);

      const name = optionalString(entry, 'name', context, errors);
      profiles.push(
        Object.freeze({
          id,
          audience: audienceOf(id),
          name: name ?? id,
          expansion: frozenCopy(entry['expansion'] ?? []),
        }),
      );
    });

    for (const id of PROFILE_IDS) {
      if (!seen.has(id)) {
        errors.push({ message: `Missing required profile: "${id}"` });
      }
    }
    return profiles;
  }

  private validateBundles(raw: unknown, errors: ValidationError[]): BundleDefinition[] {
    const bundles: BundleDefinition[] = [];
    if (raw !== undefined && raw !== null && !Array.isArray(raw)) {
      errors.push({ message: '"bundles" must be a list' });
      return bundles;
    }
    const entries: ReadonlyArray<unknown> = Array.isArray(raw) ? raw : [];
    const seen = new Set<string>();

    entries.forEach((entry, index) => {
      const context = `bundles[${index}]`;
      if (!isRecord(entry)) {
        errors.push({ message: 'Bundle entry must be a mapping', context });
        return;
      }
      const id = entry['id'];
      if (typeof id !== 'string' || id.trim() === '') {
        errors.push({ message: 'Bundle id must be a non-empty string', context });
        return;
      }
      if (seen.has(id)) {
        errors.push({
          message: `Duplicate bundle id: "${id}". Bundle ids must be unique across the registry`,
          context,
        });
        return;
      }
      seen.add(id);

      const bundleContext = `bundle: ${id}`;
      const keywords = this.validateKeywords(entry['match'], bundleContext, errors);
      const domain = optionalString(entry, 'domain', bundleContext, errors);
      const task = optionalString(entry, 'task', bundleContext, errors);
      const name = optionalString(entry, 'name', bundleContext, errors);
      if (keywords === undefined) return;

      bundles.push(
        Object.freeze({
          id,
          name: name ?? id,
          domain: domain ?? '',
          task: task ?? '',
          keywords,
          expansion: frozenCopy(entry['expansion'] ?? []),
        }),
      );
    });

    return bundles;
  }

  /**
   * Validate `match.keywords_any`. Keywords are a set: repeats (compared
   * case-insensitively) are dropped, first occurrence wins.
   */
  private validateKeywords(
    match: unknown,
    context: string,
    errors: ValidationError[],
  ): ReadonlyArray<string> | undefined {
    const raw = isRecord(match) ? match['keywords_any'] : undefined;
    if (!Array.isArray(raw) || raw.length === 0) {
      errors.push({ message: 'Bundle must declare a non-empty match.keywords_any list', context });
      return undefined;
    }

    const entries: ReadonlyArray<unknown> = raw;
    const keywords: string[] = [];
    const seen = new Set<string>();
    const errorCount = errors.length;
    for (const [index, keyword] of entries.entries()) {
      if (typeof keyword !== 'string' || keyword.trim() === '') {
        errors.push({ message: `Keyword ${index} must be a non-empty string`, context });
        continue;
      }
      const folded = keyword.toLowerCase();
      if (seen.has(folded)) continue;
      seen.add(folded);
      keywords.push(keyword);
    }

    return errors.length === errorCount ? Object.freeze(keywords) : undefined;
  }
}

/** Validate a parsed registry document without constructing a Registry. */
export function validateRegistryDocument(document: unknown): ValidationResult<RegistryDocument> {
  return new RegistryValidator().validateDocument(document);
}
