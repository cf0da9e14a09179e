/**
 * CompText Runtime Host — Registry source
 *
 * Reads a registry file and builds the Registry.
 *
 * Formats by extension: `.yaml` / `.yml` through the `yaml` package,
 * `.json` through JSON.parse. Any other extension is read as YAML, which
 * also accepts JSON.
 *
 * Two failure classes are kept apart:
 * - RegistrySourceError: the file cannot be read or parsed at all.
 * - ConfigurationError: the file parses but the document is invalid
 *   (raised by createRegistry).
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createRegistry, type Registry } from '@comptext/registry';
import { isNodeError } from '../state/state-io.js';

export type RegistryFormat = 'yaml' | 'json';

export class RegistrySourceError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'RegistrySourceError';
  }
}

export function registryFormatOf(path: string): RegistryFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Parse registry source text into a plain document.
 *
 * @throws {RegistrySourceError} If the text is not valid YAML or JSON
 */
export function parseRegistrySource(text: string, format: RegistryFormat, path = '<inline>'): unknown {
  try {
    const document: unknown = format === 'json' ? JSON.parse(text) : parseYaml(text);
    return document;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RegistrySourceError(`Cannot parse registry ${path} as ${format.toUpperCase()}: ${reason}`, path);
  }
}

/**
 * Read, parse and validate a registry file.
 *
 * @throws {RegistrySourceError} If the file is missing, unreadable or unparseable
 * @throws {ConfigurationError} If the document fails validation
 */
export function loadRegistryFile(path: string): Registry {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new RegistrySourceError(`Registry file not found: ${path}`, path);
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new RegistrySourceError(`Cannot read registry ${path}: ${reason}`, path);
  }
  return createRegistry(parseRegistrySource(text, registryFormatOf(path), path));
}
