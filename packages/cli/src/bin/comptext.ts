#!/usr/bin/env -S node --import tsx
/**
 * bin/comptext.ts — TTY-aware entry point for the `comptext` command.
 *
 * With no arguments, in a TTY, with COMPTEXT_NO_TUI unset: launches the
 * interactive readline shell. Otherwise: delegates to Commander.
 *
 * COMPTEXT_NO_TUI=1 comptext     → Commander help
 * comptext (in TTY)              → interactive shell
 * comptext compile <text...>     → one compilation, then exit
 *
 * Runs from source through the tsx loader: `npm start -- compile <text...>`.
 */

import { isInteractiveDisabled } from '@comptext/runtime-host'

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.argv.length <= 2 && !isInteractiveDisabled()

if (isInteractive) {
  const { launchShell } = await import('../tui/shell.js')
  launchShell()
} else {
  const { program } = await import('../commands/index.js')
  program.parse()
}
