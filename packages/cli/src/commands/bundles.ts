/**
 * comptext bundles — Inspect the bundle registry
 *
 * Subcommands:
 *   comptext bundles list         — every bundle, in registration order
 *   comptext bundles show <id>    — one bundle with its keywords and expansion
 */

import { Command } from 'commander';
import { formatBundleDetail, formatBundleList } from '../output/format.js';
import { fail, loadRegistry, print, printJson, type SourceOptions } from './context.js';

interface BundlesOptions extends SourceOptions {
  json?: boolean;
}

export const bundlesCommand = new Command('bundles').description('Inspect the bundle registry');

bundlesCommand
  .command('list')
  .description('List registered bundles in registration order')
  .option('--json', 'Output as JSON')
  .option('--registry <path>', 'Registry file (default: bundles/bundles.yaml)')
  .action((options: BundlesOptions) => {
    const registry = loadRegistry('bundles list', options);
    if (options.json === true) {
      printJson(registry.listBundles());
      return;
    }
    print(formatBundleList(registry.listBundles()));
  });

bundlesCommand
  .command('show')
  .description('Show one bundle')
  .argument('<id>', 'Bundle id, e.g. code.review.v1')
  .option('--json', 'Output as JSON')
  .option('--registry <path>', 'Registry file (default: bundles/bundles.yaml)')
  .action((id: string, options: BundlesOptions) => {
    const registry = loadRegistry('bundles show', options);
    const bundle = registry.getBundle(id);
    if (bundle === undefined) {
      fail('bundles show', new Error(`Unknown bundle: ${id}`));
    }
    if (options.json === true) {
      printJson(bundle);
      return;
    }
    print(formatBundleDetail(bundle));
  });
