/**
 * CompText Runtime Host — File-backed compile log sink
 *
 * Implements LogSink from @comptext/compiler by appending one JSONL line per
 * compilation to `logs/compile.jsonl` through the injected StateIO. This is
 * the only place in the system that writes compile-log entries to disk.
 *
 * Each line carries a fresh ULID `event_id` ahead of the entry fields.
 * The write is synchronous; the entry is durable when append() returns.
 */

import { CompileLogger, type CompileLogEntry, type LogSink } from '@comptext/compiler';
import { isCompileLogEnabled } from '../config.js';
import { FileStateIO, type StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const COMPILE_LOG_FILE = 'compile.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(entry: CompileLogEntry): void {
    this.stateIO.appendLine(COMPILE_LOG_FILE, JSON.stringify({ event_id: ulid(), ...entry }));
  }
}

/**
 * A CompileLogger writing to `<home>/logs/compile.jsonl`, or a no-op
 * logger when COMPTEXT_LOG disables the compile log.
 */
export function openCompileLogger(home: string): CompileLogger {
  return isCompileLogEnabled() ? new CompileLogger(new FileLogSink(new FileStateIO(home))) : new CompileLogger();
}
