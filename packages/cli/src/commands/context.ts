/**
 * commands/context.ts — plumbing shared by every command: source loading,
 * output, and the failure path.
 *
 * Failures print `[comptext <command>] <message>` in red on stderr and exit 1.
 */

import type { Codex } from '@comptext/codex';
import type { Registry } from '@comptext/registry';
import { loadCodexFile, loadRegistryFile, resolveCodexPath, resolveRegistryPath } from '@comptext/runtime-host';
import { formatErrorLines } from '../output/format.js';
import { t } from '../tui/theme.js';

/** Source flags accepted by the commands that read the registry or codex. */
export interface SourceOptions {
  registry?: string;
  codex?: string;
  home?: string;
}

export function fail(command: string, err: unknown): never {
  const [first = '', ...rest] = formatErrorLines(err);
  // eslint-disable-next-line no-console
  console.error(t.red(`[comptext ${command}] ${first}`));
  for (const line of rest) {
    // eslint-disable-next-line no-console
    console.error(t.red(line));
  }
  process.exit(1);
}

export function print(lines: string | ReadonlyArray<string>): void {
  // eslint-disable-next-line no-console
  console.log(typeof lines === 'string' ? lines : lines.join('\n'));
}

export function printJson(value: unknown): void {
  print(JSON.stringify(value, null, 2));
}

export function loadRegistry(command: string, options: SourceOptions): Registry {
  try {
    return loadRegistryFile(resolveRegistryPath({ registry: options.registry }));
  } catch (err: unknown) {
    fail(command, err);
  }
}

export function loadCodex(command: string, options: SourceOptions): Codex {
  try {
    return loadCodexFile(resolveCodexPath({ codex: options.codex }));
  } catch (err: unknown) {
    fail(command, err);
  }
}
