/**
 * Loadout Runtime Host — File-backed Acquisition Log Sink
 *
 * Implements the LogSink interface from @loadout/core by appending JSONL
 * entries to `<home>/logs/acquisition.jsonl` through the injected StateIO.
 *
 * Synchronous: the line is written before the logger call returns, so the
 * last entry before a crash is on disk.
 */

import type { AcquisitionLogEntry, LogSink } from '@loadout/core';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const ACQUISITION_LOG_FILE = 'acquisition.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly logfilename: string = ACQUISITION_LOG_FILE,
  ) {}

  append(entry: AcquisitionLogEntry): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: entry.timestamp,
      level: entry.level,
      event: entry.event,
      message: entry.message,
      artifact: entry.artifact,
      fields: entry.fields,
    });
    this.stateIO.appendLine(this.logfilename, line);
  }
}
