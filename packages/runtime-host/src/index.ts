/**
 * @comptext/runtime-host
 *
 * Everything in CompText that touches the outside world: configuration and
 * home resolution, registry and codex file loading, registry hot reload,
 * and compile-log persistence. The compiler, registry, codex and dsl
 * packages stay free of I/O; this package supplies it.
 */

// Configuration
export type { ResolveOptions } from './config.js';
export {
  DEFAULT_CODEX_PATH,
  DEFAULT_REGISTRY_PATH,
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
} from './config.js';

// Sources
export type { RegistryFormat } from './sources/registry-source.js';
export {
  RegistrySourceError,
  loadRegistryFile,
  parseRegistrySource,
  registryFormatOf,
} from './sources/registry-source.js';
export { loadCodexFile } from './sources/codex-source.js';

// Hot reload
export type { RegistryLoader } from './registry-holder.js';
export { RegistryHolder } from './registry-holder.js';

// StateIO and compile log
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export { COMPILE_LOG_FILE, FileLogSink, openCompileLogger } from './logging/file-log-sink.js';
export type { CompileLogEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readCompileLog } from './logging/log-reader.js';
export { ulid } from './logging/ulid.js';
