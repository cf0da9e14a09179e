/**
 * comptext log — Show recent compilations from the compile log
 *
 * Reads `<home>/logs/compile.jsonl`, deduplicated and sorted. Request text
 * is never logged; entries carry its SHA-256 only.
 */

import { Command } from 'commander';
import { COMPILE_LOG_FILE, FileStateIO, readCompileLog, resolveHome } from '@comptext/runtime-host';
import { formatLogEvents } from '../output/format.js';
import { fail, print, printJson } from './context.js';

export const logCommand = new Command('log')
  .description('Show recent compilations from the compile log')
  .option('--limit <n>', 'Maximum number of entries, newest last', '20')
  .option('--json', 'Output as JSON')
  .option('--home <path>', 'CompText home (default: ~/.comptext)')
  .action((options: { limit: string; json?: boolean; home?: string }) => {
    const limit = Number(options.limit);
    if (!Number.isInteger(limit) || limit < 1) {
      fail('log', new Error(`--limit must be a positive integer, got ${options.limit}`));
    }

    const stateIO = new FileStateIO(resolveHome({ home: options.home }));
    const { events, stats } = readCompileLog(stateIO.readLogRaw(COMPILE_LOG_FILE));
    const recent = events.slice(-limit);

    if (options.json === true) {
      printJson({ events: recent, stats });
      return;
    }
    print(formatLogEvents(recent));
    if (stats.parseErrors > 0 || stats.partialTrailingLine) {
      print(`(${stats.parseErrors} unreadable line(s) skipped${stats.partialTrailingLine ? ', partial last line' : ''})`);
    }
  });
