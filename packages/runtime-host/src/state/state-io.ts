/**
 * Loadout Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading and writing JSON
 * state files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under the loadout home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Settings persistence and the acquisition log both go through StateIO, so
 * neither ever builds an absolute path under the home directory itself.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../util/node-error.js';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the home
 * - appendLine and readLogRaw address the `logs/` subdirectory of the home
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns `undefined` if the file does not exist. The parsed value is
   * returned as `unknown`; callers validate its shape.
   *
   * @param filename - Filename within the state subdirectory (e.g. 'settings.json')
   * @throws {SyntaxError} If the file exists but is not valid JSON
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append one line (a newline is added) to a log file.
   * Creates the logs subdirectory if it does not exist.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'acquisition.jsonl')
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text content of a log file, or an empty string if it does not exist.
   * Used by readLog() for dedupe-on-read.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO under a home directory.
 *
 *   JSON state → `<home>/state/<filename>`
 *   Log lines  → `<home>/logs/<logfilename>`
 *
 * Directories are created on demand. I/O is synchronous so that a log line
 * is on disk before the logger call returns. ENOENT on read is not an error;
 * every other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 *
 * JSON values round-trip through serialization to match FileStateIO
 * (undefined properties disappear, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * All lines appended to a log file. Specific to MemoryStateIO; tests use it
   * to inspect log output without touching the filesystem.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}
