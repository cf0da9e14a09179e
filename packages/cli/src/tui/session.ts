/**
 * session.ts — line handling for the interactive shell.
 *
 * A ShellSession owns the compile settings and answers one input line at a
 * time. It never touches stdin or stdout; shell.ts does the terminal work.
 *
 * Lines starting with '/' are shell commands. Every other non-empty line is
 * compiled against the holder's current registry.
 */

import type { Codex } from '@comptext/codex'
import { formatResult, type CompileLogger } from '@comptext/compiler'
import {
  Audience,
  CompileMode,
  ReturnMode,
  parseAudience,
  parseCompileMode,
  parseReturnMode,
} from '@comptext/dsl'
import type { RegistryHolder } from '@comptext/runtime-host'
import { formatBundleList, formatEntryList, formatErrorLines } from '../output/format.js'
import { helpText } from './output/help.js'
import { buildPS1 } from './prompt.js'
import { stateColor, t } from './theme.js'

export interface ShellSettings {
  audience: Audience
  mode: CompileMode
  returnMode: ReturnMode
}

export type ShellReply =
  | { readonly kind: 'output'; readonly text: string }
  | { readonly kind: 'exit' }

export interface ShellSessionOptions {
  readonly logger?: CompileLogger | undefined
  /** Loads the codex on first use of /codex. */
  readonly codex?: (() => Codex) | undefined
}

const output = (lines: ReadonlyArray<string>): ShellReply => ({
  kind: 'output',
  text: lines.map((l) => '  ' + l).join('\n'),
})

const error = (lines: ReadonlyArray<string>): ShellReply =>
  output(lines.map((l) => t.red(l)))

export class ShellSession {
  private readonly settings: ShellSettings = {
    audience: Audience.Dev,
    mode: CompileMode.BundleOnly,
    returnMode: ReturnMode.DslPlusConfidence,
  }
  private codex: Codex | undefined

  constructor(
    private readonly holder: RegistryHolder,
    private readonly options: ShellSessionOptions = {},
  ) {}

  prompt(): string {
    return buildPS1(this.settings.audience)
  }

  current(): Readonly<ShellSettings> {
    return { ...this.settings }
  }

  handle(line: string): ShellReply {
    const input = line.trim()
    if (input === '') {
      return output([])
    }
    if (!input.startsWith('/')) {
      return this.compile(input)
    }

    const [cmd = '', ...rest] = input.split(/\s+/)
    const arg = rest.join(' ')

    switch (cmd) {
      case '/help':
        return { kind: 'output', text: helpText() }
      case '/exit':
      case '/quit':
        return { kind: 'exit' }
      case '/settings':
        return this.showSettings()
      case '/audience': {
        const audience = parseAudience(arg)
        if (audience === undefined) return error(['usage: /audience dev|audit|exec'])
        this.settings.audience = audience
        return this.showSettings()
      }
      case '/mode': {
        const mode = parseCompileMode(arg)
        if (mode === undefined) return error(['usage: /mode bundle_only|allow_inline_fallback'])
        this.settings.mode = mode
        return this.showSettings()
      }
      case '/return': {
        const returnMode = parseReturnMode(arg)
        if (returnMode === undefined) {
          return error(['usage: /return dsl_only|dsl_plus_confidence|dsl_plus_explanation'])
        }
        this.settings.returnMode = returnMode
        return this.showSettings()
      }
      case '/bundles':
        return output(formatBundleList(this.holder.current().listBundles()))
      case '/reload':
        return this.reload()
      case '/codex':
        return this.searchCodex(arg)
      default:
        return output([t.red('unknown command: ') + t.muted(input), t.dim("type '/help' for available commands")])
    }
  }

  private compile(text: string): ShellReply {
    try {
      const result = this.holder.compiler({ logger: this.options.logger }).compile({ text, ...this.settings })
      return output([stateColor(result.state)(`[${result.state}]`), ...formatResult(result).split('\n')])
    } catch (err: unknown) {
      return error(formatErrorLines(err))
    }
  }

  private showSettings(): ShellReply {
    const s = this.settings
    return output([
      t.muted('audience ') + t.text(s.audience),
      t.muted('mode     ') + t.text(s.mode),
      t.muted('return   ') + t.text(s.returnMode),
    ])
  }

  private reload(): ShellReply {
    try {
      const registry = this.holder.reload()
      return output([
        t.green('registry reloaded: ') +
          t.text(`${registry.listBundles().length} bundles, hash ${registry.hash.slice(0, 8)}`),
      ])
    } catch (err: unknown) {
      return error([...formatErrorLines(err), 'previous registry still in use'])
    }
  }

  private searchCodex(query: string): ShellReply {
    const load = this.options.codex
    if (load === undefined) {
      return error(['no codex configured'])
    }
    try {
      if (this.codex === undefined) {
        this.codex = load()
      }
      return output(formatEntryList(this.codex.search(query)))
    } catch (err: unknown) {
      return error(formatErrorLines(err))
    }
  }
}
