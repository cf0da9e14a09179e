/**
 * CompText Runtime Host — Configuration resolution
 *
 * Every path the host uses is resolved through the same precedence chain:
 *
 *   1. Explicit option (a CLI flag such as --registry)
 *   2. Environment variable
 *   3. Default
 *
 * | setting  | flag         | environment              | default                        |
 * |----------|--------------|--------------------------|--------------------------------|
 * | home     | --home       | COMPTEXT_HOME            | ~/.comptext                    |
 * | registry | --registry   | COMPTEXT_REGISTRY_PATH   | <cwd>/bundles/bundles.yaml     |
 * | codex    | --codex      | COMPTEXT_CODEX_PATH      | <cwd>/data/codex.json          |
 *
 * Home layout:
 *
 *   <COMPTEXT_HOME>/
 *     logs/
 *       compile.jsonl
 *
 * Use these functions throughout the host and the CLI. Never build these
 * paths from process.cwd() directly.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const ENV_HOME = 'COMPTEXT_HOME';
export const ENV_REGISTRY_PATH = 'COMPTEXT_REGISTRY_PATH';
export const ENV_CODEX_PATH = 'COMPTEXT_CODEX_PATH';
export const ENV_NO_TUI = 'COMPTEXT_NO_TUI';
export const ENV_LOG = 'COMPTEXT_LOG';

export const DEFAULT_REGISTRY_PATH = join('bundles', 'bundles.yaml');
export const DEFAULT_CODEX_PATH = join('data', 'codex.json');

/** Explicit overrides, typically from CLI flags. Empty strings count as absent. */
export interface ResolveOptions {
  readonly home?: string | undefined;
  readonly registry?: string | undefined;
  readonly codex?: string | undefined;
  /** Base directory for the relative defaults. Default: process.cwd(). */
  readonly cwd?: string | undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function envValue(name: string): string | undefined {
  return nonEmpty(process.env[name]);
}

/**
 * Resolve the CompText home directory and create it if missing.
 *
 * @returns Absolute path of the home directory
 */
export function resolveHome(opts?: ResolveOptions): string {
  const home = resolve(nonEmpty(opts?.home) ?? envValue(ENV_HOME) ?? join(homedir(), '.comptext'));
  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

/** Absolute path of the registry file. The file itself is not checked. */
export function resolveRegistryPath(opts?: ResolveOptions): string {
  const cwd = opts?.cwd ?? process.cwd();
  return resolve(cwd, nonEmpty(opts?.registry) ?? envValue(ENV_REGISTRY_PATH) ?? DEFAULT_REGISTRY_PATH);
}

/** Absolute path of the codex file. The file itself is not checked. */
export function resolveCodexPath(opts?: ResolveOptions): string {
  const cwd = opts?.cwd ?? process.cwd();
  return resolve(cwd, nonEmpty(opts?.codex) ?? envValue(ENV_CODEX_PATH) ?? DEFAULT_CODEX_PATH);
}

/** False when COMPTEXT_LOG is set to 0, false or off. */
export function isCompileLogEnabled(): boolean {
  const value = envValue(ENV_LOG)?.toLowerCase();
  return value !== '0' && value !== 'false' && value !== 'off';
}

/** True when COMPTEXT_NO_TUI is set to anything but an empty string. */
export function isInteractiveDisabled(): boolean {
  return envValue(ENV_NO_TUI) !== undefined;
}
