import type { Registry } from '@comptext/registry'
import { t } from '../theme.js'

/**
 * headerText — the startup banner.
 *
 *   1. Wordmark + tagline
 *   2. Separator line
 *   3. Registry in use: path, bundle count, short hash
 */
export function headerText(registry: Registry, registryPath: string): string {
  let out = '\n'
  out += '  ' + t.blue.bold('C O M P T E X T') + '\n'
  out += '  ' + t.muted('natural language → CompText DSL') + '\n'

  out += '\n  ' + t.dim('─'.repeat(60)) + '\n\n'

  out += (
    '  ' +
    t.muted('registry') +
    '  ' + t.text(registryPath) +
    '  ' + t.dim('·') +
    '  ' + t.text(`${registry.listBundles().length} bundles`) +
    '  ' + t.dim('·') +
    '  ' + t.muted('hash') + ' ' + t.blueDim(registry.hash.slice(0, 8)) +
    '\n'
  )
  out += '  ' + t.dim("type '/help' for commands; anything else is compiled") + '\n'
  return out
}
