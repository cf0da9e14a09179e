/**
 * CompText Compiler — Purity Test
 *
 * Statically verifies that packages/compiler/src/ imports none of the
 * side-effectful Node.js modules (filesystem, subprocess, sockets).
 * node:crypto is allowed: input hashing is a pure computation.
 *
 * Source scan only; no build artifacts.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const compilerSrcDir = join(testDir, '..', 'src');

const FORBIDDEN_IMPORT_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'node:fs', pattern: /from ['"](node:)?fs(\/promises)?['"]/ },
  { label: 'node:child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'node:net', pattern: /from ['"](node:)?net['"]/ },
  { label: 'node:http', pattern: /from ['"](node:)?https?['"]/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

describe('compiler package must not import side-effectful modules', () => {
  const sourceFiles = collectTsFiles(compilerSrcDir);

  it('compiler/src contains .ts sources', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_IMPORT_PATTERNS)('no compiler source imports $label', ({ label, pattern }) => {
    const violations = sourceFiles
      .filter((file) => pattern.test(readFileSync(file, 'utf-8')))
      .map((file) => `  ${file.replace(compilerSrcDir + '/', '')} imports ${label}`);

    expect(violations, `compiler/src must not import '${label}':\n${violations.join('\n')}`).toHaveLength(0);
  });

  it('imports node:crypto somewhere, so the allowlist is exercised', () => {
    const hasCrypto = sourceFiles.some((file) => /from ['"]node:crypto['"]/.test(readFileSync(file, 'utf-8')));
    expect(hasCrypto).toBe(true);
  });
});
