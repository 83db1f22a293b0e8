/**
 * Loadout Core — Acquisition Logger
 *
 * The AcquisitionLogger turns calls like `logger.warn(event, message, fields)`
 * into AcquisitionLogEntry records and forwards them to the injected sink.
 *
 * The sink is optional: when omitted (e.g. in tests that do not care about
 * output), every call is a no-op. Production wiring injects a concrete sink
 * (FileLogSink from the runtime host, ConsoleLogSink from the CLI, or both
 * via fanOut()).
 */

import type { AcquisitionLogEntry, LogLevel, LogSink } from './log-sink.js';

/** Structured context attached to an entry. `artifact` is lifted to the top level. */
export type LogFields = Readonly<Record<string, unknown>> & { readonly artifact?: string };

export class AcquisitionLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  debug(event: string, message: string, fields?: LogFields): void {
    this.record('debug', event, message, fields);
  }

  info(event: string, message: string, fields?: LogFields): void {
    this.record('info', event, message, fields);
  }

  warn(event: string, message: string, fields?: LogFields): void {
    this.record('warn', event, message, fields);
  }

  error(event: string, message: string, fields?: LogFields): void {
    this.record('error', event, message, fields);
  }

  private record(level: LogLevel, event: string, message: string, fields: LogFields | undefined): void {
    if (this.sink === undefined) return;
    const { artifact, ...rest }: LogFields = fields ?? {};
    const entry: AcquisitionLogEntry = {
      timestamp: this.clock().toISOString(),
      level,
      event,
      message,
      ...(typeof artifact === 'string' ? { artifact } : {}),
      ...(Object.keys(rest).length > 0 ? { fields: rest } : {}),
    };
    this.sink.append(entry);
  }
}
