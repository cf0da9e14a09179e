/**
 * CompText Runtime Host — Registry source tests
 *
 *   RS-U1: YAML and JSON registry files load into equal registries
 *   RS-U2: unreadable or unparseable files raise RegistrySourceError
 *   RS-U3: invalid documents raise ConfigurationError
 *   RS-U4: the shipped registry loads and compiles
 *
 * Isolation: temp dirs under the OS tmpdir.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@comptext/dsl';
import { CompilationState, compile } from '@comptext/compiler';
import {
  RegistrySourceError,
  loadRegistryFile,
  parseRegistrySource,
  registryFormatOf,
} from '../src/sources/registry-source.js';

const YAML_REGISTRY = `
profiles:
  - id: profile.dev.v1
  - id: profile.audit.v1
  - id: profile.exec.v1
bundles:
  - id: code.review.v1
    domain: code
    task: review
    match:
      keywords_any: [review, readability]
`;

const JSON_REGISTRY = JSON.stringify({
  profiles: [{ id: 'profile.dev.v1' }, { id: 'profile.audit.v1' }, { id: 'profile.exec.v1' }],
  bundles: [{ id: 'code.review.v1', domain: 'code', task: 'review', match: { keywords_any: ['review', 'readability'] } }],
});

function writeTemp(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'comptext-rs-'));
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('RS-U1: formats', () => {
  it('picks the format from the extension', () => {
    expect(registryFormatOf('/a/bundles.yaml')).toBe('yaml');
    expect(registryFormatOf('/a/bundles.YML')).toBe('yaml');
    expect(registryFormatOf('/a/bundles.json')).toBe('json');
    expect(registryFormatOf('/a/bundles')).toBe('yaml');
  });

  it('loads YAML and JSON sources into registries with the same hash', () => {
    const fromYaml = loadRegistryFile(writeTemp('bundles.yaml', YAML_REGISTRY));
    const fromJson = loadRegistryFile(writeTemp('bundles.json', JSON_REGISTRY));
    expect(fromYaml.listBundles().map((b) => b.id)).toEqual(['code.review.v1']);
    expect(fromYaml.hash).toBe(fromJson.hash);
  });
});

describe('RS-U2: source errors', () => {
  it('reports a missing file', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'comptext-rs-')), 'absent.yaml');
    expect(() => loadRegistryFile(path)).toThrow(new RegistrySourceError(`Registry file not found: ${path}`, path));
  });

  it('reports malformed JSON', () => {
    const path = writeTemp('bundles.json', '{"profiles": [');
    expect(() => loadRegistryFile(path)).toThrow(RegistrySourceError);
  });

  it('reports malformed YAML with the path and format', () => {
    expect(() => parseRegistrySource('bundles: [unclosed', 'yaml', 'bad.yaml')).toThrow(
      /^Cannot parse registry bad\.yaml as YAML: /,
    );
  });
});

describe('RS-U3: validation errors', () => {
  it('raises ConfigurationError for a duplicate bundle id', () => {
    const doubled = YAML_REGISTRY + `  - id: code.review.v1\n    match:\n      keywords_any: [audit]\n`;
    const path = writeTemp('bundles.yaml', doubled);
    expect(() => loadRegistryFile(path)).toThrow(ConfigurationError);
  });

  it('raises ConfigurationError for an empty file', () => {
    const path = writeTemp('bundles.yaml', '');
    expect(() => loadRegistryFile(path)).toThrow(ConfigurationError);
  });
});

describe('RS-U4: shipped registry', () => {
  const shipped = join(fileURLToPath(new URL('.', import.meta.url)), '..', '..', '..', 'bundles', 'bundles.yaml');
  const registry = loadRegistryFile(shipped);

  it('declares three profiles and twelve bundles', () => {
    expect(registry.listProfiles().map((p) => p.id)).toEqual([
      'profile.dev.v1',
      'profile.audit.v1',
      'profile.exec.v1',
    ]);
    expect(registry.listBundles()).toHaveLength(12);
  });

  it('compiles a performance request to the perfopt bundle', () => {
    const result = compile(registry, { text: 'Find the bottleneck in this slow function and optimize it' });
    expect(result.state).toBe(CompilationState.Render);
    expect(result.dsl).toBe('use:profile.dev.v1\nuse:code.perfopt.v1');
    expect(result.match.topScore).toBe(8);
    expect(result.confidence).toBe(1);
  });

  it('compiles a security request to the scan bundle', () => {
    const result = compile(registry, { text: 'Scan dependencies for vulnerabilities and leaked secrets' });
    expect(result.state).toBe(CompilationState.Render);
    expect(result.match.bundle?.id).toBe('sec.scan.highfix.v1');
    expect(result.confidence).toBe(5 / 7);
  });
});
