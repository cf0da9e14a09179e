/**
 * CompText Codex — Errors
 */

/** The codex document is unusable, or a requested entry does not exist. */
export class CodexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodexError';
  }
}

/** A search query or its options are out of bounds. */
export class CodexQueryError extends CodexError {
  constructor(message: string) {
    super(message);
    this.name = 'CodexQueryError';
  }
}
