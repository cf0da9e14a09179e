/**
 * CompText Codex — Knowledge base tests
 *
 * CX1: document parsing and entry normalization
 * CX2: module lookup by letter or full name
 * CX3: search, including query bounds and result limits
 * CX4: tag, type and id lookups
 * CX5: statistics
 * CX6: text truncation
 */

import { describe, it, expect } from 'vitest';
import { Codex } from '../src/codex.js';
import { CodexError, CodexQueryError } from '../src/errors.js';
import { CODEX_MODULES, resolveModule } from '../src/modules.js';
import { truncateText } from '../src/text.js';

function entry(id: string, fields: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    url: `https://codex.test/${id}`,
    title: `Title ${id}`,
    description: '',
    module: 'Module B: Programming',
    type: 'Documentation',
    tags: ['Core'],
    content: `# ${id}`,
    created_time: '2025-01-01T00:00:00.000Z',
    last_edited_time: '2025-02-01T00:00:00.000Z',
    ...fields,
  };
}

const DOCUMENT = {
  modules: [
    entry('b-1', { title: 'Code Review Commands', description: 'Review a pull request', tags: ['Core', 'Review'] }),
    entry('b-2', { title: 'Refactoring', type: 'Example', tags: ['Advanced'] }),
    entry('i-1', {
      title: 'Security Scan',
      description: 'Scan dependencies for known CVEs',
      module: 'Module I: Security & Compliance',
      tags: ['Core', 'Security'],
      content: 'Run the scan\u0000 now\n\tthen report',
    }),
    entry('f-1', { title: 'API Docs', module: 'Module F: Documentation', type: 'Example', tags: [] }),
  ],
};

const codex = Codex.fromDocument(DOCUMENT);

describe('CX1: document parsing', () => {
  it('keeps entries in file order', () => {
    expect(codex.listEntries().map((e) => e.id)).toEqual(['b-1', 'b-2', 'i-1', 'f-1']);
  });

  it('strips control characters but keeps newlines and tabs', () => {
    expect(codex.getContent('i-1')).toBe('Run the scan now\n\tthen report');
  });

  it('defaults missing fields to empty values', () => {
    const minimal = Codex.fromDocument({ modules: [{ id: 'x-1' }] });
    expect(minimal.getEntry('x-1')).toEqual({
      id: 'x-1',
      url: '',
      title: '',
      description: '',
      module: '',
      type: '',
      tags: [],
      content: '',
      created_time: '',
      last_edited_time: '',
    });
  });

  it('rejects a document without a modules list', () => {
    expect(() => Codex.fromDocument({ entries: [] })).toThrow(CodexError);
  });

  it('rejects an entry without an id', () => {
    expect(() => Codex.fromDocument({ modules: [{ title: 'no id' }] })).toThrow('Codex entry 0 has no id');
  });

  it('rejects duplicate ids', () => {
    expect(() => Codex.fromDocument({ modules: [entry('a'), entry('a')] })).toThrow(
      'Duplicate codex entry id: "a"',
    );
  });
});

describe('CX2: module catalog', () => {
  it('has thirteen modules A to M', () => {
    expect(CODEX_MODULES.map((m) => m.letter).join('')).toBe('ABCDEFGHIJKLM');
    expect(CODEX_MODULES[8]?.fullName).toBe('Module I: Security & Compliance');
  });

  it('resolves letters case-insensitively and full names exactly', () => {
    expect(resolveModule('b')?.fullName).toBe('Module B: Programming');
    expect(resolveModule('Module F: Documentation')?.letter).toBe('F');
    expect(resolveModule('Z')).toBeUndefined();
    expect(resolveModule('module f: documentation')).toBeUndefined();
  });

  it('filters entries by letter or name', () => {
    expect(codex.byModule('B').map((e) => e.id)).toEqual(['b-1', 'b-2']);
    expect(codex.byModule('Module I: Security & Compliance').map((e) => e.id)).toEqual(['i-1']);
    expect(codex.byModule('C')).toEqual([]);
  });
});

describe('CX3: search', () => {
  it('matches title, description and tags case-insensitively', () => {
    expect(codex.search('review').map((e) => e.id)).toEqual(['b-1']);
    expect(codex.search('CVEs').map((e) => e.id)).toEqual(['i-1']);
    expect(codex.search('core').map((e) => e.id)).toEqual(['b-1', 'i-1']);
  });

  it('does not search content', () => {
    expect(codex.search('report')).toEqual([]);
  });

  it('trims the query', () => {
    expect(codex.search('  api docs  ').map((e) => e.id)).toEqual(['f-1']);
  });

  it('stops at maxResults', () => {
    expect(codex.search('title', 2)).toHaveLength(0);
    expect(codex.search('e', 2).map((e) => e.id)).toEqual(['b-1', 'b-2']);
  });

  it('caps maxResults at 100', () => {
    const many = Codex.fromDocument({
      modules: Array.from({ length: 120 }, (_, i) => entry(`n-${i}`, { title: 'Note' })),
    });
    expect(many.search('note', 500)).toHaveLength(100);
    expect(many.search('note')).toHaveLength(20);
  });

  it('rejects blank and oversized queries', () => {
    expect(() => codex.search('   ')).toThrow(CodexQueryError);
    expect(() => codex.search('x'.repeat(201))).toThrow('Query too long (max 200 characters)');
    expect(codex.search('x'.repeat(200))).toEqual([]);
  });

  it('rejects a non-positive maxResults', () => {
    expect(() => codex.search('core', 0)).toThrow(CodexQueryError);
  });
});

describe('CX4: lookups', () => {
  it('filters by exact tag and type', () => {
    expect(codex.byTag('Security').map((e) => e.id)).toEqual(['i-1']);
    expect(codex.byTag('security')).toEqual([]);
    expect(codex.byType('Example').map((e) => e.id)).toEqual(['b-2', 'f-1']);
  });

  it('throws CodexError for an unknown id', () => {
    expect(() => codex.getEntry('nope')).toThrow('Codex entry not found: nope');
    expect(() => codex.getContent('nope')).toThrow(CodexError);
  });

  it('throws CodexQueryError for an empty id', () => {
    expect(() => codex.getEntry('')).toThrow(CodexQueryError);
  });
});

describe('CX5: statistics', () => {
  it('counts entries by module, type and tag with sorted keys', () => {
    const stats = codex.statistics();
    expect(stats.total).toBe(4);
    expect(stats.byModule).toEqual({
      'Module B: Programming': 2,
      'Module F: Documentation': 1,
      'Module I: Security & Compliance': 1,
    });
    expect(Object.keys(stats.byType)).toEqual(['Documentation', 'Example']);
    expect(stats.byTag).toEqual({ Advanced: 1, Core: 2, Review: 1, Security: 1 });
    expect(Object.keys(stats.byTag)).toEqual(['Advanced', 'Core', 'Review', 'Security']);
  });
});

describe('CX6: truncateText', () => {
  it('returns text within the limit unchanged', () => {
    expect(truncateText('short', 5)).toBe('short');
    expect(truncateText('')).toBe('');
  });

  it('cuts to the limit including the suffix', () => {
    expect(truncateText('abcdefghij', 8)).toBe('abcde...');
    expect(truncateText('abcdefghij', 8).length).toBe(8);
    expect(truncateText('abcdefghij', 5, '…')).toBe('abcd…');
  });

  it('keeps only the start of the suffix when the limit is shorter', () => {
    expect(truncateText('abcdefghij', 2)).toBe('..');
    expect(truncateText('abcdefghij', 3)).toBe('...');
    expect(truncateText('abcdefghij', 0)).toBe('');
  });
});
