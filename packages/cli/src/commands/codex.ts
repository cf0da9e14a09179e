/**
 * comptext codex — Query the codex knowledge base
 *
 * Subcommands:
 *   comptext codex modules                 — the lettered module catalog
 *   comptext codex module <letter|name>    — entries filed under a module
 *   comptext codex get <id>                — one entry with its content
 *   comptext codex search <query> [--max]  — title, description and tag search
 *   comptext codex tag <tag>               — entries carrying a tag
 *   comptext codex type <type>             — entries of a type
 *   comptext codex stats                   — counts by module, type and tag
 */

import { Command } from 'commander';
import { CODEX_MODULES, DEFAULT_MAX_RESULTS, type Codex, type CodexEntry } from '@comptext/codex';
import {
  formatEntryDetail,
  formatEntryList,
  formatModules,
  formatStatistics,
} from '../output/format.js';
import { fail, loadCodex, print, printJson, type SourceOptions } from './context.js';

interface CodexOptions extends SourceOptions {
  json?: boolean;
}

function withSourceFlags(command: Command): Command {
  return command
    .option('--json', 'Output as JSON')
    .option('--codex <path>', 'Codex file (default: data/codex.json)');
}

function printEntries(entries: ReadonlyArray<CodexEntry>, options: CodexOptions): void {
  if (options.json === true) {
    printJson(entries);
    return;
  }
  print(formatEntryList(entries));
}

/** Run a query against the codex, turning codex errors into a failed exit. */
function query<T>(name: string, options: CodexOptions, run: (codex: Codex) => T): T {
  const codex = loadCodex(`codex ${name}`, options);
  try {
    return run(codex);
  } catch (err: unknown) {
    fail(`codex ${name}`, err);
  }
}

export const codexCommand = new Command('codex').description('Query the codex knowledge base');

codexCommand
  .command('modules')
  .description('List the module catalog')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    if (options.json === true) {
      printJson(CODEX_MODULES);
      return;
    }
    print(formatModules(CODEX_MODULES));
  });

withSourceFlags(
  codexCommand
    .command('module')
    .description('List entries of a module')
    .argument('<module>', 'Module letter (A-M) or full name'),
).action((moduleName: string, options: CodexOptions) => {
  printEntries(query('module', options, (codex) => codex.byModule(moduleName)), options);
});

withSourceFlags(
  codexCommand.command('get').description('Show one entry').argument('<id>', 'Entry id'),
).action((id: string, options: CodexOptions) => {
  const entry = query('get', options, (codex) => codex.getEntry(id));
  if (options.json === true) {
    printJson(entry);
    return;
  }
  print(formatEntryDetail(entry));
});

withSourceFlags(
  codexCommand
    .command('search')
    .description('Search titles, descriptions and tags')
    .argument('<query>', 'Search text')
    .option('--max <n>', 'Maximum number of results (capped at 100)', String(DEFAULT_MAX_RESULTS)),
).action((text: string, options: CodexOptions & { max?: string }) => {
  const max = Number(options.max ?? DEFAULT_MAX_RESULTS);
  printEntries(query('search', options, (codex) => codex.search(text, max)), options);
});

withSourceFlags(
  codexCommand.command('tag').description('List entries carrying a tag').argument('<tag>', 'Tag, exact'),
).action((tag: string, options: CodexOptions) => {
  printEntries(query('tag', options, (codex) => codex.byTag(tag)), options);
});

withSourceFlags(
  codexCommand.command('type').description('List entries of a type').argument('<type>', 'Entry type, exact'),
).action((type: string, options: CodexOptions) => {
  printEntries(query('type', options, (codex) => codex.byType(type)), options);
});

withSourceFlags(codexCommand.command('stats').description('Show codex statistics')).action(
  (options: CodexOptions) => {
    const stats = query('stats', options, (codex) => codex.statistics());
    if (options.json === true) {
      printJson(stats);
      return;
    }
    print(formatStatistics(stats));
  },
);
