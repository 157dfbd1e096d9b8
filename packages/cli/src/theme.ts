import chalk, { type ChalkInstance } from 'chalk'

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

const _eventColors: Record<string, ChalkInstance> = {
  project_created:      t.green,
  project_upgraded:     t.green,
  target_type_mismatch: t.amber,
  resource_deleted:     t.amber,
}

export const eventColor = (kind: string): ChalkInstance =>
  _eventColors[kind] ?? t.text
