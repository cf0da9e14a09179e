/**
 * CompText Compiler — Log Sink Interface
 *
 * The injection point for compile-log persistence. The compiler owns this
 * contract; concrete sinks live in @comptext/runtime-host and are passed in
 * at construction. The compiler itself never writes to disk.
 */

import type { CompileLogEntry } from './compile-log.js';

/**
 * Receives compile-log entries. Implementations must not silently discard
 * them; a sink that cannot persist an entry throws.
 */
export interface LogSink {
  append(entry: CompileLogEntry): void;
}
