/**
 * CompText Compiler — Natural-language to DSL compiler
 *
 * NlCompiler is the orchestrator: normalize the request, match a bundle,
 * compute confidence, then either render canonical DSL or ask for
 * clarification.
 *
 * Compiler invariants:
 * - Deterministic: the same registry and request always produce the same
 *   result (the log timestamp aside).
 * - Closed world: rendered DSL names only registry ids.
 * - The profile line always comes first and matches the audience.
 * - No exception for any request text. InvariantViolation from the
 *   canonicalizer signals a defect and propagates.
 * - Exactly one log entry per compile() call when a logger is injected.
 *
 * The registry is injected and never mutated. Hot reload constructs a new
 * NlCompiler (or passes a new registry) rather than changing this one.
 */

import { Audience, CompileMode, ReturnMode } from '@comptext/dsl';
import type { Registry } from '@comptext/registry';
import { canonicalize } from './canonicalize.js';
import { CLARIFICATION_QUESTION, computeConfidence, meetsThreshold } from './confidence.js';
import { buildCompileLogEntry, type CompileLogger } from './logging/compile-log.js';
import { matchBundle } from './matching/matcher.js';
import {
  CompilationState,
  type CompilationRequest,
  type CompilationResult,
  type MatchResult,
} from './types.js';

export interface NlCompilerOptions {
  readonly logger?: CompileLogger | undefined;
  /** Timestamp source for log entries. Default: current time, ISO-8601. */
  readonly clock?: (() => string) | undefined;
}

/**
 * The mode that actually runs for a requested mode.
 *
 * allow_inline_fallback has no implementation of its own: inline DSL
 * generation does not exist. It runs the bundle-only path, and the result
 * reports bundle_only as the applied mode so the substitution is visible
 * to callers and in the compile log.
 */
export function resolveAppliedMode(mode: CompileMode): CompileMode {
  switch (mode) {
    case CompileMode.BundleOnly:
      return CompileMode.BundleOnly;
    case CompileMode.AllowInlineFallback:
      return CompileMode.BundleOnly;
  }
}

/** One-line summary of why a bundle was selected. */
export function explainMatch(match: MatchResult): string {
  const bundle = match.bundle;
  if (bundle === null) {
    return 'No bundle matched';
  }
  const hits = match.keywordHits.length > 0 ? match.keywordHits.join(', ') : 'n/a';
  const domain = match.domainBonus ? bundle.domain : 'none';
  const task = match.taskBonus ? bundle.task : 'none';
  const penalty = match.ambiguous ? 1 : 0;
  return (
    `Matched bundle '${bundle.id}' via keywords: ${hits}; ` +
    `domain bonus: ${domain}; task bonus: ${task}; ambiguity penalty: ${penalty}`
  );
}

export class NlCompiler {
  private readonly logger: CompileLogger | undefined;
  private readonly clock: () => string;

  constructor(
    private readonly registry: Registry,
    options: NlCompilerOptions = {},
  ) {
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  compile(request: CompilationRequest): CompilationResult {
    const audience = request.audience ?? Audience.Dev;
    const mode = request.mode ?? CompileMode.BundleOnly;
    const returnMode = request.returnMode ?? ReturnMode.DslPlusConfidence;
    const appliedMode = resolveAppliedMode(mode);

    const match = matchBundle(this.registry, request.text);
    const confidence = computeConfidence(match.adjustedScore);

    let result: CompilationResult;
    if (match.bundle === null || !meetsThreshold(confidence)) {
      result = {
        state: CompilationState.Clarify,
        dsl: '',
        confidence,
        clarification: CLARIFICATION_QUESTION,
        match,
        audience,
        mode,
        appliedMode,
        returnMode,
      };
    } else {
      const dsl = canonicalize(this.registry, audience, [match.bundle.id], request.deltas ?? []);
      const base = {
        state: CompilationState.Render,
        dsl,
        confidence,
        clarification: null,
        match,
        audience,
        mode,
        appliedMode,
        returnMode,
      };
      result =
        returnMode === ReturnMode.DslPlusExplanation ? { ...base, explanation: explainMatch(match) } : base;
    }

    this.logger?.record(buildCompileLogEntry(request.text, result, this.registry.hash, this.clock()));
    return result;
  }
}

/**
 * Compile one request against a registry without keeping a compiler
 * instance.
 */
export function compile(
  registry: Registry,
  request: CompilationRequest,
  options: NlCompilerOptions = {},
): CompilationResult {
  return new NlCompiler(registry, options).compile(request);
}
