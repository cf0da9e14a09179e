/**
 * CompText Codex — Codex
 *
 * The in-memory knowledge base. Built once from a parsed codex document
 * (`{ "modules": [ ...entries ] }`); immutable afterwards. Reading the file
 * is the runtime host's job.
 *
 * Entry order is file order. Every query returns entries in that order.
 */

import { CodexError, CodexQueryError } from './errors.js';
import { resolveModule } from './modules.js';
import { sanitizeText, validateQuery } from './text.js';
import type { CodexEntry, CodexStatistics } from './types.js';

export const DEFAULT_MAX_RESULTS = 20;
export const MAX_SEARCH_RESULTS = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(entry: Record<string, unknown>, field: string): string {
  const value = entry[field];
  return typeof value === 'string' ? value : '';
}

function parseEntry(raw: unknown, index: number): CodexEntry {
  if (!isRecord(raw)) {
    throw new CodexError(`Codex entry ${index} must be an object`);
  }
  const id = stringField(raw, 'id');
  if (id === '') {
    throw new CodexError(`Codex entry ${index} has no id`);
  }
  const rawTags: unknown = raw['tags'];
  const tags = Array.isArray(rawTags)
    ? rawTags.filter((tag: unknown): tag is string => typeof tag === 'string')
    : [];
  return Object.freeze({
    id,
    url: stringField(raw, 'url'),
    title: sanitizeText(stringField(raw, 'title')),
    description: sanitizeText(stringField(raw, 'description')),
    module: stringField(raw, 'module'),
    type: stringField(raw, 'type'),
    tags: Object.freeze(tags),
    content: sanitizeText(stringField(raw, 'content')),
    created_time: stringField(raw, 'created_time'),
    last_edited_time: stringField(raw, 'last_edited_time'),
  });
}

function countBy(values: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export class Codex {
  private readonly entries: ReadonlyArray<CodexEntry>;
  private readonly entriesById: ReadonlyMap<string, CodexEntry>;

  private constructor(entries: ReadonlyArray<CodexEntry>) {
    this.entries = Object.freeze([...entries]);
    this.entriesById = new Map(entries.map((e) => [e.id, e]));
    Object.freeze(this);
  }

  /**
   * Build a Codex from a parsed codex document.
   *
   * @throws {CodexError} If the document has no `modules` list, an entry is
   *   not an object or lacks an id, or two entries share an id
   */
  static fromDocument(document: unknown): Codex {
    const modules: unknown = isRecord(document) ? document['modules'] : undefined;
    if (!Array.isArray(modules)) {
      throw new CodexError('Codex document must be an object with a "modules" list');
    }
    const raw: ReadonlyArray<unknown> = modules;
    const entries = raw.map((entry, index) => parseEntry(entry, index));

    const seen = new Set<string>();
    for (const entry of entries) {
      if (seen.has(entry.id)) {
        throw new CodexError(`Duplicate codex entry id: "${entry.id}"`);
      }
      seen.add(entry.id);
    }
    return new Codex(entries);
  }

  /** Every entry, in file order. */
  listEntries(): ReadonlyArray<CodexEntry> {
    return this.entries;
  }

  /**
   * Entries filed under a module, given as its letter or full name.
   * A name outside the catalog matches entries that carry it verbatim.
   */
  byModule(letterOrName: string): ReadonlyArray<CodexEntry> {
    const name = resolveModule(letterOrName)?.fullName ?? letterOrName;
    return this.entries.filter((e) => e.module === name);
  }

  /** @throws {CodexError} If no entry has this id */
  getEntry(id: string): CodexEntry {
    if (id.trim() === '') {
      throw new CodexQueryError('Entry id cannot be empty');
    }
    const entry = this.entriesById.get(id);
    if (entry === undefined) {
      throw new CodexError(`Codex entry not found: ${id}`);
    }
    return entry;
  }

  /** Markdown content of an entry. @throws {CodexError} If no entry has this id */
  getContent(id: string): string {
    return this.getEntry(id).content;
  }

  /**
   * Case-insensitive substring search over title, description and tags.
   *
   * @param maxResults - Defaults to 20, capped at 100
   * @throws {CodexQueryError} If the query is blank or too long, or
   *   maxResults is not a positive integer
   */
  search(query: string, maxResults: number = DEFAULT_MAX_RESULTS): ReadonlyArray<CodexEntry> {
    const needle = validateQuery(query).toLowerCase();
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new CodexQueryError(`maxResults must be a positive integer, got ${maxResults}`);
    }
    const limit = Math.min(maxResults, MAX_SEARCH_RESULTS);

    const results: CodexEntry[] = [];
    for (const entry of this.entries) {
      if (
        entry.title.toLowerCase().includes(needle) ||
        entry.description.toLowerCase().includes(needle) ||
        entry.tags.join(' ').toLowerCase().includes(needle)
      ) {
        results.push(entry);
        if (results.length >= limit) break;
      }
    }
    return results;
  }

  /** Entries carrying `tag` exactly. */
  byTag(tag: string): ReadonlyArray<CodexEntry> {
    return this.entries.filter((e) => e.tags.includes(tag));
  }

  /** Entries of `type` exactly. */
  byType(type: string): ReadonlyArray<CodexEntry> {
    return this.entries.filter((e) => e.type === type);
  }

  statistics(): CodexStatistics {
    return {
      total: this.entries.length,
      byModule: countBy(this.entries.map((e) => e.module)),
      byType: countBy(this.entries.map((e) => e.type)),
      byTag: countBy(this.entries.flatMap((e) => e.tags)),
    };
  }
}
