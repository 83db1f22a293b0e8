import chalk, { type ChalkInstance } from 'chalk'
import { ArtifactState } from '@loadout/core'
import type { LogLevel } from '@loadout/core'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _stateColors: Record<ArtifactState, ChalkInstance> = {
  [ArtifactState.Installed]: t.green,
  [ArtifactState.Absent]:    t.amber,
  [ArtifactState.Corrupted]: t.red,
}

export const stateColor = (state: ArtifactState): ChalkInstance =>
  _stateColors[state]

const _levelColors: Record<LogLevel, ChalkInstance> = {
  debug: t.dim,
  info:  t.text,
  warn:  t.amber,
  error: t.red,
}

export const levelColor = (level: LogLevel): ChalkInstance =>
  _levelColors[level]
