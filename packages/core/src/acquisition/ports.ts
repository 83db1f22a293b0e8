/**
 * Loadout Core — Acquisition Ports
 *
 * Every side effect of the acquisition manager flows through these
 * interfaces. The core package never touches the filesystem or the network
 * directly; concrete implementations live in @loadout/runtime-host and are
 * injected at construction time. Tests inject in-memory fakes.
 */

import type { FetchRequest, FetchResult, IntegrityCheck } from '../types/outcome.js';

// ---------------------------------------------------------------------------
// Port Interfaces
// ---------------------------------------------------------------------------

/**
 * Moves bytes from a source URI into a destination path, resuming from a
 * staging file when one exists.
 *
 * Implementations must never leave a partially written file at
 * `request.destinationPath`, and must never throw for transfer failures:
 * those are reported as `{ status: 'failed' }`.
 */
export interface ArtifactFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

/**
 * Computes and compares content digests.
 *
 * `check` with an empty or undefined `expectedDigest` must report
 * `{ verdict: 'no-digest', valid: true }` without reading the file.
 */
export interface IntegrityChecker {
  check(path: string, expectedDigest: string | undefined, algorithm: string): Promise<IntegrityCheck>;
}

/**
 * The filesystem operations the manager needs. Paths are absolute.
 */
export interface ArtifactFileSystem {
  /** True when a regular file exists at the path. */
  isFile(path: string): Promise<boolean>;
  /** Size of the regular file at the path, or null when there is none. */
  sizeOf(path: string): Promise<number | null>;
  /** Delete a file. Absent files are not an error. */
  remove(path: string): Promise<void>;
  /** Create a directory and its parents. Existing directories are not an error. */
  ensureDirectory(path: string): Promise<void>;
}

/**
 * Wait `ms` milliseconds. Resolves `true` when the wait completed and
 * `false` when `signal` aborted it first. Never rejects.
 */
export type Sleeper = (ms: number, signal?: AbortSignal | undefined) => Promise<boolean>;

/** The full set of ports handed to the acquisition manager. */
export interface AcquisitionPorts {
  readonly fetcher: ArtifactFetcher;
  readonly verifier: IntegrityChecker;
  readonly files: ArtifactFileSystem;
  /** Defaults to a timer-based sleeper when omitted. */
  readonly sleep?: Sleeper | undefined;
}
