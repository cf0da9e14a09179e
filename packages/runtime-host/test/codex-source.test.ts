/**
 * CompText Runtime Host — Codex source tests
 *
 *   CXS-U1: a codex file loads into a Codex
 *   CXS-U2: missing files and invalid JSON raise CodexError
 *   CXS-U3: the shipped codex loads and answers queries
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CodexError } from '@comptext/codex';
import { loadCodexFile } from '../src/sources/codex-source.js';

function writeTemp(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'comptext-cxs-')), 'codex.json');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('CXS-U1: loading', () => {
  it('builds a codex from a file', () => {
    const path = writeTemp(
      JSON.stringify({
        modules: [
          { id: 'x-1', title: 'Retry policies', module: 'Module J: DevOps', type: 'Guide', tags: ['ci'] },
        ],
      }),
    );
    const codex = loadCodexFile(path);
    expect(codex.listEntries().map((e) => e.id)).toEqual(['x-1']);
    expect(codex.getEntry('x-1').title).toBe('Retry policies');
  });
});

describe('CXS-U2: errors', () => {
  it('reports a missing file', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'comptext-cxs-')), 'absent.json');
    expect(() => loadCodexFile(path)).toThrow(new CodexError(`Codex file not found: ${path}`));
  });

  it('reports invalid JSON', () => {
    const path = writeTemp('{ "modules": ');
    expect(() => loadCodexFile(path)).toThrow(CodexError);
    expect(() => loadCodexFile(path)).toThrow(/^Invalid JSON in codex /);
  });

  it('reports a document without modules', () => {
    expect(() => loadCodexFile(writeTemp('{}'))).toThrow(
      'Codex document must be an object with a "modules" list',
    );
  });
});

describe('CXS-U3: shipped codex', () => {
  const shipped = join(fileURLToPath(new URL('.', import.meta.url)), '..', '..', '..', 'data', 'codex.json');
  const codex = loadCodexFile(shipped);

  it('loads every entry', () => {
    expect(codex.statistics().total).toBe(10);
  });

  it('finds the security scan entry by tag', () => {
    expect(codex.byTag('Security').map((e) => e.id)).toContain('i-security-scan');
  });
});
