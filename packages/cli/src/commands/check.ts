/**
 * comptext check — Closed-world check of a CompText DSL file
 *
 * Parses the file and verifies that every `use:` directive names a profile
 * or bundle of the registry. Prints `ok` with the directive count, or one
 * line per error and exits 1.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { checkDsl } from '@comptext/compiler';
import { formatValidationError } from '../output/format.js';
import { fail, loadRegistry, print, type SourceOptions } from './context.js';

export const checkCommand = new Command('check')
  .description('Check a DSL file against the bundle registry')
  .argument('<dsl-file>', 'File containing CompText DSL')
  .option('--registry <path>', 'Registry file (default: bundles/bundles.yaml)')
  .action((file: string, options: SourceOptions) => {
    let source: string;
    try {
      source = readFileSync(file, 'utf-8');
    } catch (err: unknown) {
      fail('check', err);
    }

    const registry = loadRegistry('check', options);
    const result = checkDsl(source, registry);
    if (!result.ok) {
      const count = result.errors.length;
      fail(
        'check',
        new Error(
          `${file}: ${count} error${count === 1 ? '' : 's'}\n` +
            result.errors.map((e) => `  - ${formatValidationError(e)}`).join('\n'),
        ),
      );
    }

    const bundles = result.value.bundles.length;
    print(`ok: ${result.value.profile.id} + ${bundles} bundle${bundles === 1 ? '' : 's'}`);
  });
