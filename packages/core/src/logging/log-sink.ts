/**
 * Loadout Core — Log Sink Interface
 *
 * Defines the injection point for acquisition log persistence.
 *
 * The core owns the contract (this interface) and the AcquisitionLogger
 * class. Concrete sinks that write to disk or a terminal live in the runtime
 * host and the CLI, and are injected at construction time. There is no
 * module-level logger anywhere in the tree: two managers with two sinks
 * never see each other's entries.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Ordered lowest to highest. */
export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error'];

/**
 * A single structured log entry.
 *
 * `event` is a stable dotted identifier (e.g. 'acquire.attempt-failed')
 * intended for filtering; `message` is the human-readable line.
 */
export interface AcquisitionLogEntry {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly event: string;
  readonly message: string;
  /** Artifact name, when the entry concerns a single artifact. */
  readonly artifact?: string | undefined;
  /** Additional diagnostic context (paths, attempt numbers, causes). */
  readonly fields?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * A sink that receives log entries.
 *
 * append() is synchronous: the entry is handed off before the logger call
 * returns. Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: AcquisitionLogEntry): void;
}

/**
 * In-memory sink. Stores every entry in arrival order.
 *
 * Suitable for tests and for callers that want to inspect what a single
 * operation logged.
 */
export class MemoryLogSink implements LogSink {
  private readonly entries: AcquisitionLogEntry[] = [];

  append(entry: AcquisitionLogEntry): void {
    this.entries.push(entry);
  }

  /** All captured entries, optionally narrowed to one event id. */
  list(event?: string): ReadonlyArray<AcquisitionLogEntry> {
    return event === undefined ? [...this.entries] : this.entries.filter((e) => e.event === event);
  }
}

/** A sink that forwards each entry to every given sink, in order. */
export function fanOut(...sinks: ReadonlyArray<LogSink>): LogSink {
  return {
    append(entry: AcquisitionLogEntry): void {
      for (const sink of sinks) sink.append(entry);
    },
  };
}
