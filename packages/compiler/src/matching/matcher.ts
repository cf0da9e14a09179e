/**
 * CompText Compiler — Bundle Matcher
 *
 * Scores every registered bundle against a request text and selects the
 * best match.
 *
 * Scoring rules (bonuses are additive and never negative):
 * - +2 for each bundle keyword that is a substring of the normalized input
 * - +1 when the input contains a trigger of the bundle's domain
 * - +1 when the input contains a trigger of the bundle's task
 *
 * Ambiguity: among bundles that scored above zero, when a runner-up exists
 * (exact ties included) and the gap to the top score is at most 1, the
 * adjusted score is the top score minus 1. The penalty changes confidence
 * only; it never changes which bundle is selected.
 *
 * Selection: highest raw score. Ties go to the bundle registered first.
 *
 * Normalization is lowercasing and nothing else. Punctuation stays, and
 * keywords match inside longer words.
 */

import type { BundleDefinition, Registry } from '@comptext/registry';
import type { BundleScore, MatchResult } from '../types.js';
import { DOMAIN_TRIGGERS, TASK_TRIGGERS, triggers } from './triggers.js';

export const KEYWORD_POINTS = 2;
export const DOMAIN_BONUS = 1;
export const TASK_BONUS = 1;
export const AMBIGUITY_PENALTY = 1;
/** Maximum gap between the top two scores that still counts as ambiguous. */
export const AMBIGUITY_GAP = 1;

export function normalizeText(text: string): string {
  return text.toLowerCase();
}

/** Score one bundle against already-normalized input. */
export function scoreBundle(bundle: BundleDefinition, normalized: string): BundleScore {
  if (normalized.trim() === '') {
    return { bundleId: bundle.id, score: 0, keywordHits: [], domainBonus: false, taskBonus: false };
  }

  const keywordHits = bundle.keywords.filter((keyword) => normalized.includes(keyword.toLowerCase()));
  const domainBonus = triggers(DOMAIN_TRIGGERS, bundle.domain, normalized);
  const taskBonus = triggers(TASK_TRIGGERS, bundle.task, normalized);

  return {
    bundleId: bundle.id,
    score:
      keywordHits.length * KEYWORD_POINTS + (domainBonus ? DOMAIN_BONUS : 0) + (taskBonus ? TASK_BONUS : 0),
    keywordHits,
    domainBonus,
    taskBonus,
  };
}

/**
 * Score every bundle of the registry, in registry order.
 */
export function scoreBundles(registry: Registry, text: string): ReadonlyArray<BundleScore> {
  const normalized = normalizeText(text);
  return registry.listBundles().map((bundle) => scoreBundle(bundle, normalized));
}

/**
 * Match a request text against the registry.
 *
 * Never throws for any input string. Empty or whitespace-only text yields a
 * result with a null bundle and zero scores.
 */
export function matchBundle(registry: Registry, text: string): MatchResult {
  const scores = scoreBundles(registry, text);

  let best: BundleScore | undefined;
  for (const candidate of scores) {
    // Strictly greater: the first registered bundle keeps a tie.
    if (candidate.score > 0 && (best === undefined || candidate.score > best.score)) {
      best = candidate;
    }
  }

  if (best === undefined) {
    return {
      bundle: null,
      topScore: 0,
      secondScore: null,
      ambiguous: false,
      adjustedScore: 0,
      keywordHits: [],
      domainBonus: false,
      taskBonus: false,
      scores,
    };
  }

  const positive = scores
    .map((s) => s.score)
    .filter((score) => score > 0)
    .sort((a, b) => b - a);
  const topScore = best.score;
  const secondScore = positive[1] ?? null;
  const ambiguous = secondScore !== null && topScore - secondScore <= AMBIGUITY_GAP;

  return {
    bundle: registry.getBundle(best.bundleId) ?? null,
    topScore,
    secondScore,
    ambiguous,
    adjustedScore: ambiguous ? topScore - AMBIGUITY_PENALTY : topScore,
    keywordHits: best.keywordHits,
    domainBonus: best.domainBonus,
    taskBonus: best.taskBonus,
    scores,
  };
}
