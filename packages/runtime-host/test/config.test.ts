/**
 * CompText Runtime Host — Configuration resolution tests
 *
 *   CFG-U1: an explicit option wins over the environment
 *   CFG-U2: the environment wins over the default
 *   CFG-U3: defaults resolve against the working directory
 *   CFG-U4: COMPTEXT_LOG and COMPTEXT_NO_TUI switches
 *
 * Isolation: every test saves and restores the COMPTEXT_* variables.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ENV_CODEX_PATH,
  ENV_HOME,
  ENV_LOG,
  ENV_NO_TUI,
  ENV_REGISTRY_PATH,
  isCompileLogEnabled,
  isInteractiveDisabled,
  resolveCodexPath,
  resolveHome,
  resolveRegistryPath,
} from '../src/config.js';

const VARIABLES = [ENV_HOME, ENV_REGISTRY_PATH, ENV_CODEX_PATH, ENV_LOG, ENV_NO_TUI];
const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const name of VARIABLES) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
});

afterEach(() => {
  for (const name of VARIABLES) {
    const value = saved.get(name);
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});

describe('CFG-U1: explicit options', () => {
  it('uses the --registry value over COMPTEXT_REGISTRY_PATH', () => {
    process.env[ENV_REGISTRY_PATH] = '/env/bundles.yaml';
    expect(resolveRegistryPath({ registry: '/flag/bundles.yaml' })).toBe('/flag/bundles.yaml');
  });

  it('uses the --home value and creates the directory', () => {
    const home = join(mkdtempSync(join(tmpdir(), 'comptext-cfg-')), 'nested', 'home');
    process.env[ENV_HOME] = '/somewhere/else';
    expect(resolveHome({ home })).toBe(home);
    expect(existsSync(home)).toBe(true);
  });

  it('treats an empty option as absent', () => {
    process.env[ENV_CODEX_PATH] = '/env/codex.json';
    expect(resolveCodexPath({ codex: '' })).toBe('/env/codex.json');
  });
});

describe('CFG-U2: environment', () => {
  it('reads COMPTEXT_HOME', () => {
    const home = mkdtempSync(join(tmpdir(), 'comptext-cfg-'));
    process.env[ENV_HOME] = home;
    expect(resolveHome()).toBe(home);
  });

  it('resolves a relative environment path against cwd', () => {
    process.env[ENV_REGISTRY_PATH] = 'config/registry.json';
    expect(resolveRegistryPath({ cwd: '/srv/app' })).toBe('/srv/app/config/registry.json');
  });
});

describe('CFG-U3: defaults', () => {
  it('defaults the registry and codex paths under cwd', () => {
    expect(resolveRegistryPath({ cwd: '/srv/app' })).toBe('/srv/app/bundles/bundles.yaml');
    expect(resolveCodexPath({ cwd: '/srv/app' })).toBe('/srv/app/data/codex.json');
  });
});

describe('CFG-U4: switches', () => {
  it('enables the compile log unless COMPTEXT_LOG turns it off', () => {
    expect(isCompileLogEnabled()).toBe(true);
    process.env[ENV_LOG] = '0';
    expect(isCompileLogEnabled()).toBe(false);
    process.env[ENV_LOG] = 'OFF';
    expect(isCompileLogEnabled()).toBe(false);
    process.env[ENV_LOG] = '1';
    expect(isCompileLogEnabled()).toBe(true);
  });

  it('disables the interactive shell when COMPTEXT_NO_TUI is set', () => {
    expect(isInteractiveDisabled()).toBe(false);
    process.env[ENV_NO_TUI] = '1';
    expect(isInteractiveDisabled()).toBe(true);
  });
});
