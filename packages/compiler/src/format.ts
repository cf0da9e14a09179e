/**
 * CompText Compiler — Result formatting
 *
 * The visible form of a CompilationResult, as text and as a structured
 * payload. The return mode decides what is visible:
 *
 *   dsl_only              dsl (plus the clarification in the clarify state)
 *   dsl_plus_confidence   dsl, confidence, clarification
 *   dsl_plus_explanation  dsl, confidence, clarification, explanation
 *
 * The clarification question is visible in every mode. The explanation
 * exists only in the render state, so it is absent from a clarify result.
 */

import { ReturnMode } from '@comptext/dsl';
import type { CompilationResult } from './types.js';

/** The visible fields of a compilation result. */
export interface CompilationPayload {
  readonly dsl: string;
  readonly confidence?: number;
  readonly clarification?: string | null;
  readonly explanation?: string;
}

/** Confidence as displayed: two decimals. */
export function formatConfidence(confidence: number): string {
  return confidence.toFixed(2);
}

/**
 * Render a result as text.
 *
 * @example
 * dsl:
 * use:profile.dev.v1
 * use:code.perfopt.v1
 *
 * confidence: 1.00
 * clarification: null
 */
export function formatResult(result: CompilationResult): string {
  const lines = ['dsl:', result.dsl];
  switch (result.returnMode) {
    case ReturnMode.DslOnly:
      if (result.clarification !== null) {
        lines.push('', `clarification: ${result.clarification}`);
      }
      return lines.join('\n');
    case ReturnMode.DslPlusConfidence:
    case ReturnMode.DslPlusExplanation:
      lines.push('', `confidence: ${formatConfidence(result.confidence)}`);
      lines.push(`clarification: ${result.clarification ?? 'null'}`);
      if (result.explanation !== undefined) {
        lines.push(`explanation: ${result.explanation}`);
      }
      return lines.join('\n');
  }
}

/** The structured visible payload, for JSON output. */
export function toPayload(result: CompilationResult): CompilationPayload {
  switch (result.returnMode) {
    case ReturnMode.DslOnly:
      return result.clarification !== null
        ? { dsl: result.dsl, clarification: result.clarification }
        : { dsl: result.dsl };
    case ReturnMode.DslPlusConfidence:
    case ReturnMode.DslPlusExplanation: {
      const payload = {
        dsl: result.dsl,
        confidence: result.confidence,
        clarification: result.clarification,
      };
      return result.explanation !== undefined ? { ...payload, explanation: result.explanation } : payload;
    }
  }
}
