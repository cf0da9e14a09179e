/**
 * CompText Runtime Host — RegistryHolder
 *
 * Holds the registry a long-running host serves from, and swaps it on
 * reload.
 *
 * Swap semantics (read-copy-update):
 * - reload() builds a complete new Registry first, then replaces the
 *   reference in one assignment. Readers see the old registry or the new
 *   one, never a mix.
 * - A failed reload leaves the current registry in place and rethrows.
 * - Registries are immutable, so a compilation that captured the old
 *   reference finishes against it unchanged.
 */

import { NlCompiler, type NlCompilerOptions } from '@comptext/compiler';
import type { Registry } from '@comptext/registry';
import { loadRegistryFile } from './sources/registry-source.js';

export type RegistryLoader = () => Registry;

export class RegistryHolder {
  private registry: Registry;

  /**
   * Load the initial registry.
   *
   * @throws Whatever the loader throws; there is no previous registry to keep
   */
  constructor(private readonly loader: RegistryLoader) {
    this.registry = loader();
  }

  /** Holder over a registry file. */
  static fromFile(path: string): RegistryHolder {
    return new RegistryHolder(() => loadRegistryFile(path));
  }

  current(): Registry {
    return this.registry;
  }

  /**
   * Load the registry again and swap it in.
   *
   * @returns The new registry
   * @throws The loader's error; the previous registry stays current
   */
  reload(): Registry {
    const next = this.loader();
    this.registry = next;
    return next;
  }

  /** A compiler bound to the current registry. */
  compiler(options: NlCompilerOptions = {}): NlCompiler {
    return new NlCompiler(this.registry, options);
  }
}
