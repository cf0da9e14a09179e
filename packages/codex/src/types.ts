/**
 * CompText Codex — Type Definitions
 *
 * The codex is a read-only knowledge base of reference entries, each filed
 * under one of the lettered modules of the catalog (see modules.ts).
 */

/** One codex entry. Text fields are sanitized when the codex is built. */
export interface CodexEntry {
  readonly id: string;
  readonly url: string;
  readonly title: string;
  readonly description: string;
  /** Full module name, e.g. `Module B: Programming`. */
  readonly module: string;
  /** Entry type, e.g. `Documentation`, `Example`. */
  readonly type: string;
  readonly tags: ReadonlyArray<string>;
  /** Markdown body. */
  readonly content: string;
  readonly created_time: string;
  readonly last_edited_time: string;
}

/** A module of the catalog. */
export interface CodexModule {
  /** Single capital letter, `A` to `M`. */
  readonly letter: string;
  readonly name: string;
  /** `Module <letter>: <name>`, as stored on entries. */
  readonly fullName: string;
}

/** Counts over the whole codex. Keys of every map are sorted. */
export interface CodexStatistics {
  readonly total: number;
  readonly byModule: Readonly<Record<string, number>>;
  readonly byType: Readonly<Record<string, number>>;
  readonly byTag: Readonly<Record<string, number>>;
}
