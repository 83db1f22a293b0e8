/**
 * Loadout Runtime Host — LogReader
 *
 * Pure functions for reading the acquisition JSONL log with dedupe-on-read.
 *
 * Guarantees:
 *   LOGR-U1: parse every well-formed record; malformed lines are counted in parseErrors
 *   LOGR-U2: deduplicate by event_id — first seen wins; later copies counted in duplicates
 *   LOGR-U3: content not ending in '\n' has a partial trailing line, which is dropped and flagged
 *   LOGR-U4: output records are sorted by (timestamp asc, event_id asc)
 *   LOGR-U5: empty input returns an empty result with zero stats
 *
 * No I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

import { LOG_LEVELS } from '@loadout/core';
import type { LogLevel } from '@loadout/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One line of acquisition.jsonl, as written by FileLogSink. */
export interface AcquisitionLogRecord {
  /** 26-character ULID — the deduplication key. */
  readonly event_id: string;
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly event: string;
  readonly message: string;
  readonly artifact?: string | undefined;
  readonly fields?: Readonly<Record<string, unknown>> | undefined;
}

export interface LogReadStats {
  /** Non-empty complete lines processed. */
  readonly totalLines: number;
  /** Records kept after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or lacked a required field. */
  readonly parseErrors: number;
  /** True if the content did not end with '\n' (a write was interrupted). */
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly records: ReadonlyArray<AcquisitionLogRecord>;
  readonly stats: LogReadStats;
}

export interface LogFilter {
  readonly artifact?: string | undefined;
  /** Minimum level; lower levels are dropped. */
  readonly level?: LogLevel | undefined;
  /** Keep only the newest `limit` records. */
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate and sort the raw text of a JSONL log file.
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      records: [],
      stats: { totalLines: 0, parsedEvents: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const records: AcquisitionLogRecord[] = [];

  for (const line of lines) {
    const record = parseRecord(line);
    if (record === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(record.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(record.event_id);
    records.push(record);
  }

  records.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    records,
    stats: {
      totalLines: lines.length,
      parsedEvents: records.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

/**
 * Narrow sorted records by artifact and minimum level, then keep the newest
 * `limit` of them (still oldest first).
 */
export function filterLog(
  records: ReadonlyArray<AcquisitionLogRecord>,
  filter: LogFilter,
): ReadonlyArray<AcquisitionLogRecord> {
  const minRank = filter.level !== undefined ? LOG_LEVELS.indexOf(filter.level) : 0;
  const kept = records.filter(
    (r) =>
      (filter.artifact === undefined || r.artifact === filter.artifact) &&
      LOG_LEVELS.indexOf(r.level) >= minRank,
  );
  if (filter.limit === undefined || kept.length <= filter.limit) return kept;
  return kept.slice(kept.length - filter.limit);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseRecord(line: string): AcquisitionLogRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const eventId: unknown = Reflect.get(parsed, 'event_id');
  const timestamp: unknown = Reflect.get(parsed, 'timestamp');
  const level: unknown = Reflect.get(parsed, 'level');
  const event: unknown = Reflect.get(parsed, 'event');
  const message: unknown = Reflect.get(parsed, 'message');
  const artifact: unknown = Reflect.get(parsed, 'artifact');
  const fields: unknown = Reflect.get(parsed, 'fields');

  if (
    typeof eventId !== 'string' ||
    typeof timestamp !== 'string' ||
    !isLogLevel(level) ||
    typeof event !== 'string' ||
    typeof message !== 'string'
  ) {
    return null;
  }

  return {
    event_id: eventId,
    timestamp,
    level,
    event,
    message,
    ...(typeof artifact === 'string' ? { artifact } : {}),
    ...(isRecord(fields) ? { fields } : {}),
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
