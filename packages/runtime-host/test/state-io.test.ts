/**
 * Loadout Runtime Host — StateIO Contract Tests
 *
 *   SIO-U1: readLogRaw returns '' for a log that has never been written
 *   SIO-U2: appended lines come back newline-terminated
 *   SIO-U3: readJson returns undefined for a missing file and round-trips values
 *   SIO-U4: FileStateIO lays files out under state/ and logs/
 *   SIO-U5: FileStateIO rethrows malformed JSON as SyntaxError
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'loadout-sio-'));
}

const implementations: ReadonlyArray<[string, () => StateIO]> = [
  ['MemoryStateIO', () => new MemoryStateIO()],
  ['FileStateIO', () => new FileStateIO(tempHome())],
];

describe.each(implementations)('%s', (_name, make) => {
  it('SIO-U1: readLogRaw returns an empty string for an unwritten log', () => {
    const stateIO = make();
    stateIO.appendLine('other.jsonl', 'x');
    expect(stateIO.readLogRaw('acquisition.jsonl')).toBe('');
  });

  it('SIO-U2: appended lines are joined with newlines and a terminal newline', () => {
    const stateIO = make();
    stateIO.appendLine('acquisition.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('acquisition.jsonl', '{"event_id":"B"}');
    expect(stateIO.readLogRaw('acquisition.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });

  it('SIO-U3: readJson returns undefined when absent and the stored value otherwise', () => {
    const stateIO = make();
    expect(stateIO.readJson('settings.json')).toBeUndefined();

    stateIO.writeJson('settings.json', { concurrency: 2, skipped: undefined });

    expect(stateIO.readJson('settings.json')).toEqual({ concurrency: 2 });
  });
});

describe('FileStateIO — SIO-U4/U5', () => {
  it('writes JSON state under state/ and log lines under logs/', () => {
    const home = tempHome();
    const stateIO = new FileStateIO(home);

    stateIO.writeJson('settings.json', { maxAttempts: 4 });
    stateIO.appendLine('acquisition.jsonl', 'line');

    expect(JSON.parse(readFileSync(join(home, 'state', 'settings.json'), 'utf-8'))).toEqual({ maxAttempts: 4 });
    expect(readFileSync(join(home, 'logs', 'acquisition.jsonl'), 'utf-8')).toBe('line\n');
  });

  it('throws SyntaxError for a malformed JSON file', () => {
    const home = tempHome();
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'settings.json'), '{ not json');

    expect(() => new FileStateIO(home).readJson('settings.json')).toThrow(SyntaxError);
  });
});
