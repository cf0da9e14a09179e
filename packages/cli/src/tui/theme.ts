import chalk, { type ChalkInstance } from 'chalk'
import { CompilationState } from '@comptext/compiler'
import { Audience } from '@comptext/dsl'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _audienceColors: Record<Audience, ChalkInstance> = {
  [Audience.Dev]:   t.blue,
  [Audience.Audit]: t.amber,
  [Audience.Exec]:  t.green,
}

export const audienceColor = (audience: Audience): ChalkInstance =>
  _audienceColors[audience]

export const stateColor = (state: CompilationState): ChalkInstance =>
  state === CompilationState.Render ? t.green : t.amber
