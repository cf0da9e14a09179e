/**
 * CompText Compiler — Confidence & Clarification
 *
 * confidence = min(1, max(0, adjustedScore) / CONFIDENCE_DIVISOR)
 *
 * Below CONFIDENCE_THRESHOLD the compiler emits no DSL and asks the fixed
 * clarification question instead. The question is not personalized.
 */

/** An adjusted score of 7 or more is full confidence. */
export const CONFIDENCE_DIVISOR = 7;

export const CONFIDENCE_THRESHOLD = 0.65;

export const CLARIFICATION_QUESTION =
  'Do you mean code review, performance optimization, debugging, security scan, or documentation? Please pick one.';

export function computeConfidence(adjustedScore: number): number {
  return Math.min(1, Math.max(0, adjustedScore) / CONFIDENCE_DIVISOR);
}

/** True when a confidence value is high enough to render DSL. */
export function meetsThreshold(confidence: number): boolean {
  return confidence >= CONFIDENCE_THRESHOLD;
}
