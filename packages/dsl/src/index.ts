/**
 * @comptext/dsl
 *
 * CompText DSL — closed vocabularies, canonical renderer, parser, and the
 * error types shared across the compiler.
 *
 * This package is the base layer. It has no internal CompText dependencies.
 */

// Types
export type {
  Delta,
  Directive,
  DslProgram,
  ParseError,
  ParseResult,
  ProfileId,
  ValidationError,
  ValidationResult,
} from './types.js';

export {
  Audience,
  CompileMode,
  ConfigurationError,
  InvariantViolation,
  PROFILE_ID_BY_AUDIENCE,
  PROFILE_IDS,
  ReturnMode,
} from './types.js';

// Functions
export { formatDelta, parseDelta, renderDsl } from './render.js';
export { parseDsl } from './parser.js';
export { parseAudience, parseCompileMode, parseReturnMode } from './vocabulary.js';
