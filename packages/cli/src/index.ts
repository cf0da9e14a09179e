/**
 * @comptext/cli
 *
 * The `comptext` command. The binary lives in src/bin/comptext.ts; this
 * module exposes the pieces other hosts embed: the Commander program, the
 * shell session and the plain-text formatters.
 */

export { program } from './commands/index.js'
export { buildCompileRequest } from './commands/compile.js'
export type { CompileOptions } from './commands/compile.js'
export type { ShellReply, ShellSessionOptions, ShellSettings } from './tui/session.js'
export { ShellSession } from './tui/session.js'
export * from './output/format.js'
