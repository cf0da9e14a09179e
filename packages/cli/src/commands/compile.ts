/**
 * comptext compile — Compile a natural-language request to CompText DSL
 *
 * Usage:
 *   comptext compile "Find the bottleneck in this slow function"
 *   comptext compile --audience audit --return-mode dsl_plus_explanation review this PR
 *   comptext compile --delta depth=full --json scan for vulnerabilities
 *
 * A clarification is a normal result, not a failure: the command exits 0 and
 * prints the clarify payload.
 */

import { Command } from 'commander';
import { NlCompiler, formatResult, toPayload, type CompilationRequest } from '@comptext/compiler';
import {
  parseAudience,
  parseCompileMode,
  parseDelta,
  parseReturnMode,
  type Delta,
  type ValidationError,
  type ValidationResult,
} from '@comptext/dsl';
import { openCompileLogger, resolveHome } from '@comptext/runtime-host';
import { fail, loadRegistry, print, printJson, type SourceOptions } from './context.js';

export interface CompileOptions extends SourceOptions {
  audience?: string;
  mode?: string;
  returnMode?: string;
  delta?: string[];
  json?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Turn command-line words and flags into a compilation request. Every bad
 * flag is reported, not just the first.
 */
export function buildCompileRequest(
  words: ReadonlyArray<string>,
  options: CompileOptions,
): ValidationResult<CompilationRequest> {
  const errors: ValidationError[] = [];

  const audience = options.audience !== undefined ? parseAudience(options.audience) : undefined;
  if (options.audience !== undefined && audience === undefined) {
    errors.push({ message: `Unknown audience: "${options.audience}" (expected dev, audit or exec)` });
  }
  const mode = options.mode !== undefined ? parseCompileMode(options.mode) : undefined;
  if (options.mode !== undefined && mode === undefined) {
    errors.push({ message: `Unknown mode: "${options.mode}" (expected bundle_only or allow_inline_fallback)` });
  }
  const returnMode = options.returnMode !== undefined ? parseReturnMode(options.returnMode) : undefined;
  if (options.returnMode !== undefined && returnMode === undefined) {
    errors.push({
      message:
        `Unknown return mode: "${options.returnMode}" ` +
        '(expected dsl_only, dsl_plus_confidence or dsl_plus_explanation)',
    });
  }

  const deltas: Delta[] = [];
  for (const source of options.delta ?? []) {
    const parsed = parseDelta(source);
    if (parsed.ok) {
      deltas.push(parsed.value);
    } else {
      errors.push(...parsed.errors);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: { text: words.join(' '), audience, mode, returnMode, deltas } };
}

export const compileCommand = new Command('compile')
  .description('Compile a natural-language request to CompText DSL')
  .argument('<text...>', 'Request text')
  .option('--audience <audience>', 'Audience profile: dev | audit | exec')
  .option('--mode <mode>', 'Compile mode: bundle_only | allow_inline_fallback')
  .option('--return-mode <mode>', 'Visible fields: dsl_only | dsl_plus_confidence | dsl_plus_explanation')
  .option('--delta <key=value>', 'Modifier appended to the bundle line (repeatable)', collect, [])
  .option('--json', 'Output as JSON')
  .option('--registry <path>', 'Registry file (default: bundles/bundles.yaml)')
  .option('--home <path>', 'CompText home for the compile log (default: ~/.comptext)')
  .action((words: string[], options: CompileOptions) => {
    const request = buildCompileRequest(words, options);
    if (!request.ok) {
      fail('compile', new Error(request.errors.map((e) => e.message).join('; ')));
    }

    const registry = loadRegistry('compile', options);

    try {
      const logger = openCompileLogger(resolveHome({ home: options.home }));
      const result = new NlCompiler(registry, { logger }).compile(request.value);
      if (options.json === true) {
        printJson(toPayload(result));
      } else {
        print(formatResult(result));
      }
    } catch (err: unknown) {
      fail('compile', err);
    }
  });
