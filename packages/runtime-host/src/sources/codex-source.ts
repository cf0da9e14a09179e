/**
 * CompText Runtime Host — Codex source
 *
 * Reads a codex JSON file and builds the Codex. Every failure, from a
 * missing file to an invalid entry, surfaces as CodexError.
 */

import { readFileSync } from 'node:fs';
import { Codex, CodexError } from '@comptext/codex';
import { isNodeError } from '../state/state-io.js';

/**
 * @throws {CodexError} If the file is missing, unreadable, not JSON, or not
 *   a valid codex document
 */
export function loadCodexFile(path: string): Codex {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new CodexError(`Codex file not found: ${path}`);
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodexError(`Cannot read codex ${path}: ${reason}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodexError(`Invalid JSON in codex ${path}: ${reason}`);
  }
  return Codex.fromDocument(document);
}
