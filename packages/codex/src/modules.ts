/**
 * CompText Codex — Module catalog
 *
 * The fixed set of modules entries are filed under. Lookups accept either
 * the letter (`B`, case-insensitive) or the full name.
 */

import type { CodexModule } from './types.js';

const MODULE_NAMES: ReadonlyArray<readonly [string, string]> = [
  ['A', 'General Commands'],
  ['B', 'Programming'],
  ['C', 'Visualization'],
  ['D', 'AI Control'],
  ['E', 'Data Analysis & ML'],
  ['F', 'Documentation'],
  ['G', 'Testing & QA'],
  ['H', 'Database & Data Modeling'],
  ['I', 'Security & Compliance'],
  ['J', 'DevOps & Deployment'],
  ['K', 'Frontend & UI'],
  ['L', 'Data Pipelines & ETL'],
  ['M', 'MCP Integration'],
];

export const CODEX_MODULES: ReadonlyArray<CodexModule> = MODULE_NAMES.map(([letter, name]) =>
  Object.freeze({ letter, name, fullName: `Module ${letter}: ${name}` }),
);

/**
 * Resolve a letter or full module name to its catalog module.
 *
 * @returns undefined for anything that is neither a catalog letter nor a
 *   catalog full name
 */
export function resolveModule(letterOrName: string): CodexModule | undefined {
  const key = letterOrName.trim();
  if (key.length === 1) {
    const letter = key.toUpperCase();
    return CODEX_MODULES.find((m) => m.letter === letter);
  }
  return CODEX_MODULES.find((m) => m.fullName === key);
}
