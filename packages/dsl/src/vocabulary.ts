/**
 * CompText DSL — vocabulary parsing
 *
 * Maps external strings (CLI flags, JSON payloads) onto the closed enums.
 * Unknown values return undefined; the caller decides whether that is a
 * usage error or a reason to apply the default.
 */

import { Audience, CompileMode, ReturnMode } from './types.js';

export function parseAudience(value: string): Audience | undefined {
  switch (value.trim().toLowerCase()) {
    case 'dev':
      return Audience.Dev;
    case 'audit':
      return Audience.Audit;
    case 'exec':
      return Audience.Exec;
    default:
      return undefined;
  }
}

export function parseCompileMode(value: string): CompileMode | undefined {
  switch (value.trim().toLowerCase()) {
    case 'bundle_only':
      return CompileMode.BundleOnly;
    case 'allow_inline_fallback':
      return CompileMode.AllowInlineFallback;
    default:
      return undefined;
  }
}

export function parseReturnMode(value: string): ReturnMode | undefined {
  switch (value.trim().toLowerCase()) {
    case 'dsl_only':
      return ReturnMode.DslOnly;
    case 'dsl_plus_confidence':
      return ReturnMode.DslPlusConfidence;
    case 'dsl_plus_explanation':
      return ReturnMode.DslPlusExplanation;
    default:
      return undefined;
  }
}
