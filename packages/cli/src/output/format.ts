/**
 * output/format.ts — plain-text renderings shared by the commands and the shell.
 *
 * Every function returns lines or a string and writes nothing. Commands print
 * the result uncoloured so output stays pipeable; the shell adds colour on top.
 */

import { truncateText, type CodexEntry, type CodexModule, type CodexStatistics } from '@comptext/codex';
import { formatConfidence } from '@comptext/compiler';
import { ConfigurationError, type ValidationError } from '@comptext/dsl';
import type { BundleDefinition, Registry } from '@comptext/registry';
import type { CompileLogEvent } from '@comptext/runtime-host';

function widest(values: ReadonlyArray<string>): number {
  return values.reduce((max, v) => Math.max(max, v.length), 0);
}

function orDash(value: string): string {
  return value === '' ? '-' : value;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** One line per bundle: id, domain/task, name. */
export function formatBundleList(bundles: ReadonlyArray<BundleDefinition>): string[] {
  if (bundles.length === 0) return ['(no bundles)'];
  const idWidth = widest(bundles.map((b) => b.id));
  const tagWidth = widest(bundles.map((b) => `${orDash(b.domain)}/${orDash(b.task)}`));
  return bundles.map((b) => {
    const tags = `${orDash(b.domain)}/${orDash(b.task)}`;
    return `${b.id.padEnd(idWidth)}  ${tags.padEnd(tagWidth)}  ${b.name}`;
  });
}

export function formatBundleDetail(bundle: BundleDefinition): string[] {
  const lines = [
    `id:        ${bundle.id}`,
    `name:      ${bundle.name}`,
    `domain:    ${orDash(bundle.domain)}`,
    `task:      ${orDash(bundle.task)}`,
    `keywords:  ${bundle.keywords.join(', ')}`,
  ];
  const expansion = JSON.stringify(bundle.expansion, null, 2);
  lines.push('expansion:', ...expansion.split('\n').map((l) => `  ${l}`));
  return lines;
}

export function formatRegistrySummary(registry: Registry): string {
  return (
    `registry ok: ${registry.listBundles().length} bundles, ` +
    `${registry.listProfiles().length} profiles, hash ${registry.hash}`
  );
}

export function formatValidationError(error: ValidationError): string {
  return error.context !== undefined ? `${error.message} [${error.context}]` : error.message;
}

/**
 * Lines describing a failure. A ConfigurationError lists every validation
 * error under a count header.
 */
export function formatErrorLines(err: unknown): string[] {
  if (err instanceof ConfigurationError) {
    const count = err.errors.length;
    return [
      `Invalid bundle registry (${count} error${count === 1 ? '' : 's'}):`,
      ...err.errors.map((e) => `  - ${formatValidationError(e)}`),
    ];
  }
  return [err instanceof Error ? err.message : String(err)];
}

// ---------------------------------------------------------------------------
// Codex
// ---------------------------------------------------------------------------

export function formatModules(modules: ReadonlyArray<CodexModule>): string[] {
  return modules.map((m) => `${m.letter}  ${m.name}`);
}

/** One line per entry: id and title. */
export function formatEntryList(entries: ReadonlyArray<CodexEntry>): string[] {
  if (entries.length === 0) return ['(no entries)'];
  const idWidth = widest(entries.map((e) => e.id));
  return entries.map((e) => `${e.id.padEnd(idWidth)}  ${e.title}`);
}

/** Longest description and content shown by formatEntryDetail. */
export const DESCRIPTION_LIMIT = 320;
export const CONTENT_LIMIT = 4000;

export function formatEntryDetail(entry: CodexEntry): string[] {
  const lines = [entry.title, `${entry.module} · ${orDash(entry.type)}`];
  if (entry.tags.length > 0) lines.push(`tags: ${entry.tags.join(', ')}`);
  if (entry.url !== '') lines.push(entry.url);
  if (entry.description !== '') lines.push('', truncateText(entry.description, DESCRIPTION_LIMIT));
  if (entry.content !== '') lines.push('', truncateText(entry.content, CONTENT_LIMIT));
  return lines;
}

function countLines(label: string, counts: Readonly<Record<string, number>>): string[] {
  const keys = Object.keys(counts);
  const width = widest(keys);
  return [`${label}:`, ...keys.map((k) => `  ${k.padEnd(width)}  ${counts[k] ?? 0}`)];
}

export function formatStatistics(stats: CodexStatistics): string[] {
  return [
    `total: ${stats.total}`,
    ...countLines('by module', stats.byModule),
    ...countLines('by type', stats.byType),
    ...countLines('by tag', stats.byTag),
  ];
}

// ---------------------------------------------------------------------------
// Compile log
// ---------------------------------------------------------------------------

/** One line per compile-log event: timestamp, state, bundle, confidence. */
export function formatLogEvents(events: ReadonlyArray<CompileLogEvent>): string[] {
  if (events.length === 0) return ['(no compilations logged)'];
  return events.map((e) => {
    const state = e.fields['state'];
    const bundle = e.fields['bundle_id'];
    const confidence = e.fields['confidence'];
    return [
      e.timestamp,
      (typeof state === 'string' ? state : '?').padEnd(7),
      (typeof bundle === 'string' ? bundle : '-'),
      typeof confidence === 'number' ? formatConfidence(confidence) : '-',
    ].join('  ');
  });
}
