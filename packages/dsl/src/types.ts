/**
 * CompText DSL — Core Type Definitions
 *
 * This module defines the closed vocabularies of the compiler (audiences,
 * compilation modes, return modes), the fixed profile identifiers, the
 * parsed directive shapes, and the result and error types shared by every
 * other CompText package.
 *
 * This package has no internal CompText dependencies.
 */

// ---------------------------------------------------------------------------
// Audience
// ---------------------------------------------------------------------------

/**
 * The audiences a compiled request can target.
 *
 * Each audience maps to exactly one profile directive, which is always the
 * first line of the rendered DSL. New audiences require a new profile id in
 * PROFILE_ID_BY_AUDIENCE; the compiler switches over this enum exhaustively.
 */
export enum Audience {
  /** Developers. Default when the caller does not choose. */
  Dev = 'dev',
  /** Auditors and compliance reviewers. */
  Audit = 'audit',
  /** Executive summaries. */
  Exec = 'exec',
}

/**
 * The recognised profile identifiers. Registry documents may not declare
 * any other profile.
 */
export type ProfileId = 'profile.dev.v1' | 'profile.audit.v1' | 'profile.exec.v1';

export const PROFILE_ID_BY_AUDIENCE: Readonly<Record<Audience, ProfileId>> = {
  [Audience.Dev]: 'profile.dev.v1',
  [Audience.Audit]: 'profile.audit.v1',
  [Audience.Exec]: 'profile.exec.v1',
};

/** All recognised profile ids, in audience declaration order. */
export const PROFILE_IDS: ReadonlyArray<ProfileId> = [
  PROFILE_ID_BY_AUDIENCE[Audience.Dev],
  PROFILE_ID_BY_AUDIENCE[Audience.Audit],
  PROFILE_ID_BY_AUDIENCE[Audience.Exec],
];

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

/**
 * How the compiler may produce DSL.
 *
 * Only BundleOnly has an implementation. AllowInlineFallback is accepted so
 * callers can express the intent, but it runs the bundle-only path and the
 * compilation result reports the mode actually applied.
 */
export enum CompileMode {
  BundleOnly = 'bundle_only',
  AllowInlineFallback = 'allow_inline_fallback',
}

/**
 * Which parts of a compilation result are visible to the caller.
 */
export enum ReturnMode {
  /** The dsl block only. */
  DslOnly = 'dsl_only',
  /** dsl, confidence and clarification. Default. */
  DslPlusConfidence = 'dsl_plus_confidence',
  /** dsl, confidence, clarification and a match explanation. */
  DslPlusExplanation = 'dsl_plus_explanation',
}

// ---------------------------------------------------------------------------
// Directives
// ---------------------------------------------------------------------------

/**
 * A pass-through modifier attached to a bundle directive, rendered as
 * `+key=value`.
 */
export interface Delta {
  readonly key: string;
  readonly value: string;
}

/** One `use:<id>` line of a DSL program. */
export interface Directive {
  readonly id: string;
  readonly deltas: ReadonlyArray<Delta>;
  /** 1-based source line. */
  readonly line: number;
}

/**
 * A parsed DSL program: the profile directive followed by bundle directives.
 */
export interface DslProgram {
  readonly profile: Directive;
  readonly bundles: ReadonlyArray<Directive>;
}

// ---------------------------------------------------------------------------
// Parse and Validation Result Types
// ---------------------------------------------------------------------------

/** A parse error produced by the DSL parser. Line and column are 1-based. */
export interface ParseError {
  readonly line: number;
  readonly column: number;
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly program: DslProgram }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

/**
 * A validation error produced by the registry validator, the delta parser,
 * or the closed-world DSL check.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * The registry source is malformed: duplicate bundle id, empty keyword set,
 * unknown or missing profile. Raised only while a registry is constructed.
 * The hosting process must refuse to serve requests.
 */
export class ConfigurationError extends Error {
  readonly errors: ReadonlyArray<ValidationError>;

  constructor(errors: ReadonlyArray<ValidationError>) {
    super(
      `Invalid bundle registry (${errors.length} error${errors.length === 1 ? '' : 's'}): ` +
        errors.map((e) => (e.context !== undefined ? `${e.message} [${e.context}]` : e.message)).join('; '),
    );
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

/**
 * A programming defect: the canonicalizer was asked to render an id that is
 * not in the registry, or a delta that cannot be rendered. Never caused by
 * user text. Transports surface it as an internal error.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violation: ${message}`);
    this.name = 'InvariantViolation';
  }
}
