/**
 * @comptext/registry
 *
 * Bundle registry: document validation, content hashing, and the
 * immutable Registry consumed by the compiler.
 *
 * This package performs no I/O. Reading registry files lives in
 * @comptext/runtime-host.
 */

export type { BundleDefinition, ProfileDefinition, RegistryDocument } from './types.js';
export { Registry, createRegistry } from './registry.js';
export { RegistryValidator, validateRegistryDocument } from './validator.js';
export { canonicalize, contentHash } from './hash.js';
