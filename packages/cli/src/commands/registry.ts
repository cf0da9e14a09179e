/**
 * comptext registry — Registry file checks
 *
 *   comptext registry validate [file]
 *
 * Loads the file exactly as the compiler would and reports either a summary
 * with the content hash or every validation error (exit 1).
 */

import { Command } from 'commander';
import { formatRegistrySummary } from '../output/format.js';
import { loadRegistry, print } from './context.js';

export const registryCommand = new Command('registry').description('Validate bundle registry files');

registryCommand
  .command('validate')
  .description('Validate a registry file and print its content hash')
  .argument('[file]', 'Registry file (default: --registry, COMPTEXT_REGISTRY_PATH, then bundles/bundles.yaml)')
  .option('--registry <path>', 'Registry file when no argument is given')
  .action((file: string | undefined, options: { registry?: string }) => {
    const registry = loadRegistry('registry validate', { registry: file ?? options.registry ?? '' });
    print(formatRegistrySummary(registry));
  });
