/**
 * @comptext/compiler
 *
 * Natural-language to CompText DSL compiler: bundle matching, confidence
 * gating, clarification, canonical rendering and the compile log contract.
 *
 * This package is side-effect free. Log persistence is injected through
 * LogSink; registry loading lives in @comptext/runtime-host.
 */

// Types
export type {
  BundleScore,
  CompilationRequest,
  CompilationResult,
  MatchResult,
} from './types.js';
export { CompilationState } from './types.js';

// Matching
export {
  AMBIGUITY_GAP,
  AMBIGUITY_PENALTY,
  DOMAIN_BONUS,
  KEYWORD_POINTS,
  TASK_BONUS,
  matchBundle,
  normalizeText,
  scoreBundle,
  scoreBundles,
} from './matching/matcher.js';
export { DOMAIN_TRIGGERS, TASK_TRIGGERS } from './matching/triggers.js';

// Confidence
export {
  CLARIFICATION_QUESTION,
  CONFIDENCE_DIVISOR,
  CONFIDENCE_THRESHOLD,
  computeConfidence,
  meetsThreshold,
} from './confidence.js';

// Rendering
export { canonicalize } from './canonicalize.js';
export { checkDsl } from './check.js';
export type { CompilationPayload } from './format.js';
export { formatConfidence, formatResult, toPayload } from './format.js';

// Compiler
export type { NlCompilerOptions } from './compiler.js';
export { NlCompiler, compile, explainMatch, resolveAppliedMode } from './compiler.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export type { CompileLogEntry } from './logging/compile-log.js';
export { CompileLogger, buildCompileLogEntry, hashInput } from './logging/compile-log.js';
