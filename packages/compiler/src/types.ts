/**
 * CompText Compiler — Type Definitions
 *
 * Request, match and result shapes of one compilation. All of them are plain
 * immutable data; nothing here holds a reference back to the compiler.
 */

import type { Audience, CompileMode, Delta, ReturnMode } from '@comptext/dsl';
import type { BundleDefinition } from '@comptext/registry';

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/** Score breakdown for one bundle. */
export interface BundleScore {
  readonly bundleId: string;
  /** Raw score: keyword points plus bonuses. */
  readonly score: number;
  /** Keywords found in the input, as declared in the registry. */
  readonly keywordHits: ReadonlyArray<string>;
  readonly domainBonus: boolean;
  readonly taskBonus: boolean;
}

/**
 * Matcher output.
 *
 * `bundle` is null when no bundle scored above zero. The keyword and bonus
 * fields describe the selected bundle; they are empty/false without one.
 */
export interface MatchResult {
  readonly bundle: BundleDefinition | null;
  readonly topScore: number;
  readonly secondScore: number | null;
  readonly ambiguous: boolean;
  /** topScore, less the ambiguity penalty when it applies. */
  readonly adjustedScore: number;
  readonly keywordHits: ReadonlyArray<string>;
  readonly domainBonus: boolean;
  readonly taskBonus: boolean;
  /** Every bundle's score, in registry order. */
  readonly scores: ReadonlyArray<BundleScore>;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

export enum CompilationState {
  /** Confidence reached the threshold; `dsl` holds the rendered program. */
  Render = 'render',
  /** Confidence below the threshold; `dsl` is empty, a question is asked. */
  Clarify = 'clarify',
}

/** A compilation request. Omitted fields take their defaults. */
export interface CompilationRequest {
  readonly text: string;
  /** Default: dev. */
  readonly audience?: Audience | undefined;
  /** Default: bundle_only. */
  readonly mode?: CompileMode | undefined;
  /** Default: dsl_plus_confidence. */
  readonly returnMode?: ReturnMode | undefined;
  /** Pass-through modifiers for the bundle line. */
  readonly deltas?: ReadonlyArray<Delta> | undefined;
}

export interface CompilationResult {
  readonly state: CompilationState;
  /** Canonical DSL; empty in the clarify state. */
  readonly dsl: string;
  /** In [0, 1]. */
  readonly confidence: number;
  /** Non-null exactly in the clarify state. */
  readonly clarification: string | null;
  /** Present only for dsl_plus_explanation in the render state. */
  readonly explanation?: string;
  readonly match: MatchResult;
  readonly audience: Audience;
  /** The mode the caller asked for. */
  readonly mode: CompileMode;
  /** The mode that actually ran. */
  readonly appliedMode: CompileMode;
  readonly returnMode: ReturnMode;
}
