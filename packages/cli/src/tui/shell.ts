/**
 * shell.ts — CompText interactive readline shell.
 *
 * Two layers:
 *
 * LAYER 1 — READLINE
 *   Node.js readline: prompt display, line editing, history, submit on
 *   Enter, Ctrl+C.
 *
 * LAYER 2 — STDOUT OUTPUT
 *   Direct process.stdout.write() of ShellSession replies. Append-only.
 *
 * Each submitted line goes to ShellSession.handle(); the prompt is rebuilt
 * afterwards because /audience changes it.
 */

import * as readline from 'readline'
import {
  RegistryHolder,
  loadCodexFile,
  openCompileLogger,
  resolveCodexPath,
  resolveHome,
  resolveRegistryPath,
} from '@comptext/runtime-host'
import { formatErrorLines } from '../output/format.js'
import { headerText } from './output/header.js'
import { ShellSession } from './session.js'
import { t } from './theme.js'

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Called from src/bin/comptext.ts when the process is running in a TTY,
 * no arguments were given and COMPTEXT_NO_TUI is not set. A registry that
 * fails to load ends the process with exit code 1 before the prompt shows.
 */
export function launchShell(): void {
  const registryPath = resolveRegistryPath()

  let holder: RegistryHolder
  try {
    holder = RegistryHolder.fromFile(registryPath)
  } catch (err: unknown) {
    for (const line of formatErrorLines(err)) {
      process.stderr.write(t.red(line) + '\n')
    }
    process.exit(1)
  }

  const session = new ShellSession(holder, {
    logger: openCompileLogger(resolveHome()),
    codex:  () => loadCodexFile(resolveCodexPath()),
  })

  process.stdout.write(headerText(holder.current(), registryPath))

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: 50,
  })

  const showPrompt = (): void => {
    rl.setPrompt(session.prompt())
    process.stdout.write('\n' + session.prompt())
  }

  rl.on('line', (line: string) => {
    const reply = session.handle(line)
    if (reply.kind === 'exit') {
      rl.close()
      return
    }
    if (reply.text !== '') {
      process.stdout.write('\n' + reply.text + '\n')
    }
    showPrompt()
  })

  rl.on('close', () => {
    process.stdout.write('\n')
    process.exit(0)
  })

  rl.on('SIGINT', () => {
    rl.close()
  })

  showPrompt()
}
