import type { Audience } from '@comptext/dsl'
import { audienceColor, t } from './theme.js'

/**
 * buildPS1 — construct the colored PS1 prompt string.
 *
 * Format: [comptext:dev] ❯
 * The audience segment takes the audience's color.
 */
export function buildPS1(audience: Audience): string {
  const bracket = t.blueDim
  const name    = t.blue.bold
  const arrow   = t.blueDim

  return (
    bracket('[') +
    name('comptext') +
    bracket(':') +
    audienceColor(audience)(audience) +
    bracket(']') +
    arrow(' ❯ ')
  )
}
