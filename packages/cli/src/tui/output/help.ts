import { t } from '../theme.js'

/**
 * helpText — shell commands grouped by category.
 */
export function helpText(): string {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 26 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = ''

  out += section('compile')
  out += cmd('<any text>',              'compile the request with the current settings')
  out += cmd('/audience <a>',           'dev | audit | exec')
  out += cmd('/mode <m>',               'bundle_only | allow_inline_fallback')
  out += cmd('/return <r>',             'dsl_only | dsl_plus_confidence | dsl_plus_explanation')
  out += cmd('/settings',               'show the current settings')

  out += section('registry')
  out += cmd('/bundles',                'list registered bundles')
  out += cmd('/reload',                 'reload the registry file')

  out += section('codex')
  out += cmd('/codex <query>',          'search the codex')

  out += section('system')
  out += cmd('/help',                   'show this help')
  out += cmd('/exit  Ctrl+C',           'exit')

  return out
}
