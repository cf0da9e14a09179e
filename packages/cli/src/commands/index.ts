/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/comptext.ts (non-interactive path).
 */

import { program } from 'commander'
import { bundlesCommand } from './bundles.js'
import { checkCommand } from './check.js'
import { codexCommand } from './codex.js'
import { compileCommand } from './compile.js'
import { logCommand } from './log.js'
import { registryCommand } from './registry.js'

program
  .name('comptext')
  .description(
    'CompText — deterministic natural-language to CompText DSL compiler.\n' +
    'Requests map to one pre-registered bundle or to a clarification question.',
  )
  .version('0.1.0')

program.addCommand(compileCommand)
program.addCommand(bundlesCommand)
program.addCommand(registryCommand)
program.addCommand(checkCommand)
program.addCommand(codexCommand)
program.addCommand(logCommand)

export { program }
