/**
 * Terminal log sink for the CLI.
 *
 * Warnings and errors are always shown; info and debug entries only with
 * --verbose. The acquisition log file receives every entry regardless.
 */

import type { AcquisitionLogEntry, LogSink } from '@loadout/core';
import { levelColor } from './theme.js';

export class ConsoleLogSink implements LogSink {
  constructor(
    private readonly write: (line: string) => void,
    private readonly verbose: boolean = false,
  ) {}

  append(entry: AcquisitionLogEntry): void {
    if (!this.verbose && (entry.level === 'debug' || entry.level === 'info')) return;
    this.write(levelColor(entry.level)(`${entry.level.padEnd(5)} ${entry.message}`));
  }
}
