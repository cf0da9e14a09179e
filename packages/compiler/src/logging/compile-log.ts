/**
 * CompText Compiler — Compile Logger
 *
 * One entry per compilation, rendered or clarified. The request text is
 * never logged; `input_hash` identifies it instead. Together with
 * `registry_hash` an entry is enough to reproduce the decision from the
 * same text.
 *
 * Without an injected sink, record() is a no-op.
 */

import { createHash } from 'node:crypto';
import type { Audience, CompileMode, ReturnMode } from '@comptext/dsl';
import type { CompilationResult, CompilationState } from '../types.js';
import type { LogSink } from './log-sink.js';

export interface CompileLogEntry {
  /** ISO-8601 time of the compilation. */
  readonly timestamp: string;
  /** Hash of the registry the request was compiled against. */
  readonly registry_hash: string;
  /** SHA-256 hex of the raw request text. */
  readonly input_hash: string;
  readonly audience: Audience;
  readonly mode: CompileMode;
  readonly applied_mode: CompileMode;
  readonly return_mode: ReturnMode;
  readonly state: CompilationState;
  /** Selected bundle; null when nothing matched. */
  readonly bundle_id: string | null;
  readonly confidence: number;
}

export function hashInput(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Build the log entry for a finished compilation. */
export function buildCompileLogEntry(
  text: string,
  result: CompilationResult,
  registryHash: string,
  timestamp: string,
): CompileLogEntry {
  return {
    timestamp,
    registry_hash: registryHash,
    input_hash: hashInput(text),
    audience: result.audience,
    mode: result.mode,
    applied_mode: result.appliedMode,
    return_mode: result.returnMode,
    state: result.state,
    bundle_id: result.match.bundle?.id ?? null,
    confidence: result.confidence,
  };
}

export class CompileLogger {
  constructor(private readonly sink?: LogSink) {}

  record(entry: CompileLogEntry): void {
    this.sink?.append(entry);
  }
}
