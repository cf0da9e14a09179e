/**
 * CompText Compiler — Bonus trigger tables
 *
 * A bundle earns the domain bonus when the input contains any trigger of
 * its domain, and the task bonus when it contains any trigger of its task.
 * Each bonus counts at most once. Bundles whose domain or task has no
 * entry here never earn that bonus.
 *
 * Triggers are lowercase and matched as substrings of the lowercased input.
 */

export const DOMAIN_TRIGGERS: Readonly<Record<string, ReadonlyArray<string>>> = {
  code: ['function', 'class', 'refactor', 'debug', 'performance'],
  security: ['security', 'vulnerability', 'cve', 'owasp'],
  docs: ['docs', 'documentation', 'readme', 'openapi', 'swagger'],
  devops: ['ci', 'cd', 'github actions', 'kubernetes', 'helm', 'deploy'],
  data: ['sql', 'query', 'schema', 'etl', 'pipeline'],
  testing: ['test', 'coverage', 'regression', 'qa'],
};

export const TASK_TRIGGERS: Readonly<Record<string, ReadonlyArray<string>>> = {
  review: ['review', 'audit', 'inspect'],
  optimize: ['optimize', 'faster', 'speed up', 'latency'],
  debug: ['bug', 'error', 'crash', 'stack trace', 'exception'],
  scan: ['scan', 'vulnerab', 'exploit'],
  document: ['document', 'explain', 'write up'],
  deploy: ['deploy', 'release', 'rollout'],
  test: ['unit test', 'test case', 'test suite'],
};

/** True when `normalized` contains any trigger listed for `tag`. */
export function triggers(
  table: Readonly<Record<string, ReadonlyArray<string>>>,
  tag: string,
  normalized: string,
): boolean {
  if (tag === '' || !Object.hasOwn(table, tag)) return false;
  const words = table[tag] ?? [];
  return words.some((word) => normalized.includes(word));
}
