/**
 * Byte and progress formatting, and a single-line progress display for
 * interactive terminals.
 *
 * A total of 0 means the server never announced a length: the line shows
 * raw bytes instead of a percentage.
 */

import { t } from './theme.js';

const UNITS = ['KiB', 'MiB', 'GiB', 'TiB'] as const;

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit: string = UNITS[0];
  for (const next of UNITS.slice(1)) {
    if (value < 1024) break;
    value /= 1024;
    unit = next;
  }
  return `${value.toFixed(1)} ${unit}`;
}

export function formatProgressLine(name: string, bytesSoFar: number, totalBytes: number): string {
  if (totalBytes <= 0) return `${name}  ${formatBytes(bytesSoFar)}`;
  const percent = Math.min(100, (bytesSoFar / totalBytes) * 100);
  return `${name}  ${percent.toFixed(1)}%  ${formatBytes(bytesSoFar)} / ${formatBytes(totalBytes)}`;
}

/** Minimal surface of a writable terminal stream. */
export interface ProgressStream {
  readonly isTTY?: boolean | undefined;
  write(chunk: string): boolean;
}

const CLEAR_LINE = '\r\x1b[2K';
const RENDER_INTERVAL_MS = 100;

/**
 * Renders the latest progress update on one rewritten line. Off a TTY
 * progress is not drawn and `log` lines pass straight through.
 */
export class ProgressDisplay {
  private current = '';
  private lastRender = 0;

  constructor(
    private readonly stream: ProgressStream = process.stderr,
    private readonly now: () => number = Date.now,
  ) {}

  update(name: string, bytesSoFar: number, totalBytes: number): void {
    if (this.stream.isTTY !== true) return;
    const finished = totalBytes > 0 && bytesSoFar >= totalBytes;
    const at = this.now();
    if (!finished && at - this.lastRender < RENDER_INTERVAL_MS) return;
    this.lastRender = at;
    this.current = t.blue(formatProgressLine(name, bytesSoFar, totalBytes));
    this.stream.write(CLEAR_LINE + this.current);
  }

  /** Print a full line above the progress line. */
  log(line: string): void {
    if (this.current !== '') this.stream.write(CLEAR_LINE);
    this.stream.write(line + '\n');
    if (this.current !== '') this.stream.write(this.current);
  }

  /** Remove the progress line. */
  finish(): void {
    if (this.current === '') return;
    this.stream.write(CLEAR_LINE);
    this.current = '';
  }
}
