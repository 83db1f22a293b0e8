/**
 * Loadout Runtime Host — LogReader Tests
 *
 *   LOGR-U1: valid JSONL records are parsed; malformed lines are counted
 *   LOGR-U2: duplicate event_ids are dropped (first seen wins)
 *   LOGR-U3: a partial trailing line is detected and dropped
 *   LOGR-U4: output is sorted by (timestamp asc, event_id asc)
 *   LOGR-U5: empty input returns zero stats
 *   LOGR-U6: filterLog narrows by artifact, minimum level and limit
 *
 * Pure: no I/O, no clock dependency.
 */

import { describe, it, expect } from 'vitest';
import { filterLog, readLog } from '../src/logging/log-reader.js';

function line(id: string, timestamp: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ event_id: id, timestamp, level: 'info', event: 'acquire.attempt', message: id, ...extra });
}

describe('LogReader — LOGR-U1', () => {
  it('returns one record per valid line and skips blank lines', () => {
    const raw = [line('A', '2026-01-01T00:00:01.000Z'), '', line('B', '2026-01-01T00:00:02.000Z')].join('\n') + '\n';

    const result = readLog(raw);

    expect(result.records.map((r) => r.event_id)).toEqual(['A', 'B']);
    expect(result.stats).toEqual({
      totalLines: 2,
      parsedEvents: 2,
      duplicates: 0,
      parseErrors: 0,
      partialTrailingLine: false,
    });
  });

  it('counts non-JSON lines and records missing required fields as parse errors', () => {
    const raw =
      [
        '{not json',
        JSON.stringify({ event_id: 'X', timestamp: '2026-01-01T00:00:00.000Z' }),
        line('C', '2026-01-01T00:00:03.000Z', { level: 'fatal' }),
        line('D', '2026-01-01T00:00:04.000Z'),
      ].join('\n') + '\n';

    const result = readLog(raw);

    expect(result.stats.parseErrors).toBe(3);
    expect(result.records.map((r) => r.event_id)).toEqual(['D']);
  });

  it('keeps artifact and fields when present', () => {
    const raw = line('A', '2026-01-01T00:00:01.000Z', { artifact: 'speech', fields: { attempt: 2 } }) + '\n';
    expect(readLog(raw).records[0]).toEqual({
      event_id: 'A',
      timestamp: '2026-01-01T00:00:01.000Z',
      level: 'info',
      event: 'acquire.attempt',
      message: 'A',
      artifact: 'speech',
      fields: { attempt: 2 },
    });
  });
});

describe('LogReader — LOGR-U2', () => {
  it('drops later copies of an event_id', () => {
    const raw =
      [
        line('A', '2026-01-01T00:00:01.000Z', { message: 'first' }),
        line('A', '2026-01-01T00:00:01.000Z', { message: 'second' }),
      ].join('\n') + '\n';

    const result = readLog(raw);

    expect(result.records.map((r) => r.message)).toEqual(['first']);
    expect(result.stats.duplicates).toBe(1);
  });
});

describe('LogReader — LOGR-U3', () => {
  it('drops a final line that was not newline-terminated', () => {
    const raw = line('A', '2026-01-01T00:00:01.000Z') + '\n' + '{"event_id":"B","timest';

    const result = readLog(raw);

    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.stats.parseErrors).toBe(0);
    expect(result.records.map((r) => r.event_id)).toEqual(['A']);
  });
});

describe('LogReader — LOGR-U4', () => {
  it('sorts by timestamp, then event_id', () => {
    const raw =
      [
        line('C', '2026-01-01T00:00:02.000Z'),
        line('B', '2026-01-01T00:00:01.000Z'),
        line('A', '2026-01-01T00:00:02.000Z'),
      ].join('\n') + '\n';

    expect(readLog(raw).records.map((r) => r.event_id)).toEqual(['B', 'A', 'C']);
  });
});

describe('LogReader — LOGR-U5', () => {
  it('returns an empty result for empty input', () => {
    expect(readLog('')).toEqual({
      records: [],
      stats: { totalLines: 0, parsedEvents: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    });
  });
});

describe('filterLog — LOGR-U6', () => {
  const { records } = readLog(
    [
      line('A', '2026-01-01T00:00:01.000Z', { artifact: 'speech', level: 'debug' }),
      line('B', '2026-01-01T00:00:02.000Z', { artifact: 'speech', level: 'warn' }),
      line('C', '2026-01-01T00:00:03.000Z', { artifact: 'lipsync', level: 'error' }),
      line('D', '2026-01-01T00:00:04.000Z', { artifact: 'speech', level: 'error' }),
    ].join('\n') + '\n',
  );

  it('narrows by artifact', () => {
    expect(filterLog(records, { artifact: 'speech' }).map((r) => r.event_id)).toEqual(['A', 'B', 'D']);
  });

  it('narrows by minimum level', () => {
    expect(filterLog(records, { level: 'warn' }).map((r) => r.event_id)).toEqual(['B', 'C', 'D']);
  });

  it('keeps the newest records up to the limit, oldest first', () => {
    expect(filterLog(records, { limit: 2 }).map((r) => r.event_id)).toEqual(['C', 'D']);
  });
});
