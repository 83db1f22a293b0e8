/**
 * Loadout CLI — Command Tests
 *
 *   CLI-U1: list prints each artifact with its resolved path
 *   CLI-U2: status reports installed and absent artifacts
 *   CLI-U3: audit exits 1 when an artifact fails verification
 *   CLI-U4: install of a verified artifact does not fetch
 *   CLI-U5: an unknown artifact name prints an error and exits 1
 *   CLI-U6: clean removes staging files
 *   CLI-U7: config set / show / unset round-trip through settings.json
 *   CLI-U8: log shows entries written by earlier commands
 *
 * No network: every artifact used here is either installed beforehand or
 * never fetched. The home, manifest and install root live in a temp dir.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import { createProgram } from '../src/commands/index.js';

const SPEECH_BYTES = 'speech model weights';
const SPEECH_SHA256 = createHash('sha256').update(SPEECH_BYTES).digest('hex');

let work: string;
let home: string;
let root: string;
let manifest: string;
let stdout: string[];
let stderr: string[];

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  work = mkdtempSync(join(tmpdir(), 'loadout-cli-'));
  home = join(work, 'home');
  root = join(work, 'install');
  manifest = join(work, 'models.yaml');
  writeFileSync(
    manifest,
    [
      'artifacts:',
      '  - name: speech-model',
      '    type: speech-model',
      '    url: http://127.0.0.1:9/speech.bin',
      '    filename: speech.bin',
      '    size: 20',
      `    checksum: ${SPEECH_SHA256}`,
      '    checksum_type: sha256',
      '  - name: notes',
      '    type: docs',
      '    url: http://127.0.0.1:9/notes.txt',
      '    filename: notes.txt',
      '    destination: docs',
      '',
    ].join('\n'),
  );
  stdout = [];
  stderr = [];
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    stdout.push(String(line));
  });
  vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
    stderr.push(String(line));
  });
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

async function run(...args: string[]): Promise<void> {
  await createProgram()
    .exitOverride()
    .parseAsync(['--home', home, '--manifest', manifest, '--install-root', root, ...args], { from: 'user' });
}

function speechPath(): string {
  return join(root, 'models', 'speech', 'speech.bin');
}

function installSpeech(content: string = SPEECH_BYTES): void {
  mkdirSync(join(root, 'models', 'speech'), { recursive: true });
  writeFileSync(speechPath(), content);
}

describe('loadout list — CLI-U1', () => {
  it('prints name, kind, size, digest algorithm and path', async () => {
    await run('list');

    expect(stdout).toEqual([
      'speech-model  speech-model  20 B  sha256',
      `  ${speechPath()}`,
      'notes  docs  size unknown  no digest',
      `  ${join(root, 'docs', 'notes.txt')}`,
    ]);
  });
});

describe('loadout status — CLI-U2', () => {
  it('shows each state and a summary', async () => {
    installSpeech();

    await run('status');

    expect(stdout).toEqual([
      'speech-model  Installed',
      `  ${speechPath()}`,
      'notes  Absent',
      `  ${join(root, 'docs', 'notes.txt')}`,
      '\n1 of 2 artifact(s) installed',
    ]);
  });

  it('includes staged bytes in JSON output', async () => {
    mkdirSync(join(root, 'docs'), { recursive: true });
    writeFileSync(join(root, 'docs', 'notes.txt.part'), 'partial');

    await run('status', '--json');

    const reports: unknown = JSON.parse(stdout.join('\n'));
    expect(reports).toEqual([
      expect.objectContaining({ name: 'speech-model', state: 'Absent', stagedBytes: 0, hasDigest: true }),
      expect.objectContaining({ name: 'notes', state: 'Absent', stagedBytes: 7, hasDigest: false }),
    ]);
  });
});

describe('loadout audit — CLI-U3', () => {
  it('flags a corrupted artifact and sets exit code 1', async () => {
    installSpeech('tampered');
    mkdirSync(join(root, 'docs'), { recursive: true });
    writeFileSync(join(root, 'docs', 'notes.txt'), 'release notes');

    await run('audit');

    expect(stdout).toEqual(['✗ speech-model  missing or corrupted', '✓ notes', '\n1 of 2 artifact(s) verified']);
    expect(process.exitCode).toBe(1);
  });
});

describe('loadout install — CLI-U4', () => {
  it('reports an already installed artifact without fetching', async () => {
    installSpeech();

    await run('install', 'speech-model');

    expect(stdout).toEqual(['✓ speech-model  already installed']);
    expect(process.exitCode).toBeUndefined();
  });
});

describe('loadout install — CLI-U5', () => {
  it('rejects an unknown name before fetching anything', async () => {
    await run('install', 'ghost');

    expect(stderr).toEqual(["error: Unknown artifact 'ghost'. Known artifacts: speech-model, notes."]);
    expect(stdout).toEqual([]);
    expect(process.exitCode).toBe(1);
  });
});

describe('loadout clean — CLI-U6', () => {
  it('removes staging files and lists them', async () => {
    const staging = join(root, 'docs', 'notes.txt.part');
    mkdirSync(join(root, 'docs'), { recursive: true });
    writeFileSync(staging, 'partial');

    await run('clean');

    expect(stdout).toEqual([`removed ${staging}`]);
    expect(existsSync(staging)).toBe(false);
  });

  it('says so when there is nothing to remove', async () => {
    await run('clean');
    expect(stdout).toEqual(['No staging files to remove.']);
  });
});

describe('loadout config — CLI-U7', () => {
  it('stores, shows and removes a setting', async () => {
    await run('config', 'set', 'concurrency', '4');
    expect(stdout).toEqual(['concurrency = 4']);

    stdout.length = 0;
    await run('config', 'show', '--json');
    const shown: unknown = JSON.parse(stdout.join('\n'));
    expect(shown).toMatchObject({
      home,
      values: { concurrency: 4, installRoot: root, manifestPath: manifest },
      sources: { concurrency: 'file', installRoot: 'flag', manifestPath: 'flag' },
    });

    stdout.length = 0;
    await run('config', 'unset', 'concurrency');
    await run('config', 'unset', 'concurrency');
    expect(stdout).toEqual(['concurrency removed', 'concurrency was not set']);
  });

  it('rejects an unknown setting name', async () => {
    await run('config', 'set', 'retries', '2');

    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^error: Invalid setting 'retries' from command line: unknown setting; expected one of installRoot, /);
    expect(process.exitCode).toBe(1);
  });
});

describe('loadout log — CLI-U8', () => {
  it('shows acquisition events for one artifact', async () => {
    installSpeech();
    await run('install', 'speech-model');
    stdout.length = 0;

    await run('log', '--artifact', 'speech-model', '--json');

    const records: unknown = JSON.parse(stdout.join('\n'));
    expect(records).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ event: 'acquire.already-installed', level: 'info', artifact: 'speech-model' }),
      ]),
    );
  });

  it('says so when the log is empty', async () => {
    await run('log');
    expect(stdout).toEqual(['No log entries.']);
  });
});
