/**
 * Shared fixture registries for compiler tests.
 */

import { createRegistry, type Registry } from '@comptext/registry';

export const FIXED_CLOCK = (): string => '2026-01-01T00:00:00.000Z';

const PROFILES = [{ id: 'profile.dev.v1' }, { id: 'profile.audit.v1' }, { id: 'profile.exec.v1' }];

export interface BundleFixture {
  readonly id: string;
  readonly keywords: ReadonlyArray<string>;
  readonly domain?: string;
  readonly task?: string;
}

export function registryOf(bundles: ReadonlyArray<BundleFixture>): Registry {
  return createRegistry({
    profiles: PROFILES,
    bundles: bundles.map((b) => ({
      id: b.id,
      domain: b.domain,
      task: b.task,
      match: { keywords_any: b.keywords },
    })),
  });
}

/** code.review.v1 and code.perfopt.v1, both in the code domain, no task. */
export function codeRegistry(): Registry {
  return registryOf([
    { id: 'code.review.v1', keywords: ['review', 'readability', 'best practices'], domain: 'code' },
    { id: 'code.perfopt.v1', keywords: ['slow', 'bottleneck', 'optimize'], domain: 'code' },
  ]);
}

export const PERF_TEXT = 'This function is slow, find the bottleneck and optimize it';
export const REVIEW_TEXT = 'Review this code and improve readability';
