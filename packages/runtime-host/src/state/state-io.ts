/**
 * CompText Runtime Host — StateIO
 *
 * An injectable I/O abstraction for the host's append-only log files.
 *
 * Two implementations:
 *   - FileStateIO   — durable file I/O under the CompText home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded use
 *
 * Log filenames are relative; the implementation resolves them into the
 * `logs/` subdirectory of its home. Callers never build absolute paths.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Append one line to a log file. A newline is added after `line`.
   * Creates the logs directory when missing.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw content of a log file, or '' when the file does not exist.
   */
  readLogRaw(logfilename: string): string;
}

/**
 * File-backed StateIO rooted at a home directory.
 *
 * Appends go to `<homeDir>/logs/<logfilename>`. Writes are synchronous: the
 * line is on disk when appendLine returns. A missing file reads as empty;
 * every other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

/**
 * In-memory StateIO. Instances are isolated from each other.
 */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log file. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Same shape as FileStateIO: every line ends in '\n'.
    return lines.join('\n') + '\n';
  }
}

/** True when `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
