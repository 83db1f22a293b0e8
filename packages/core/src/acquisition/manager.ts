/**
 * Loadout Core — Artifact Acquisition Manager
 *
 * Orchestrates catalog, storage locator, fetcher and verifier:
 *
 *   1. Resolve the artifact's final path (StorageLocator)
 *   2. Inspect the existing file: absent / present-valid / present-invalid
 *   3. When a fetch is needed, drive the fetcher with retry + backoff,
 *      verifying the digest after every completed transfer
 *
 * State is never cached. checkStatus(), auditIntegrity() and report() read
 * the filesystem on every call, because downloads and manual edits change
 * it between calls. The only runtime state held here is the per-artifact
 * phase (phaseOf) and the single-flight map that keeps two acquisitions of
 * the same artifact from sharing a staging file.
 *
 * Error policy:
 *   - Unknown artifact names throw UnknownArtifactError (structural).
 *   - Transfer and integrity failures never throw; they are retried within
 *     the attempt budget and then reported through AcquireOutcome.
 *   - A filesystem or verifier port that throws fails that one acquisition
 *     with an io-failure; it is not retried.
 *   - Cancellation is its own outcome, never retried, staging file kept.
 */

import { dirname } from 'node:path';
import type { ArtifactCatalog } from '../catalog/catalog.js';
import { resolveArtifactPath, stagingPathFor } from '../catalog/locator.js';
import { SettingsError, TransferError, TransferFailureKind, UnknownArtifactError, describeError } from '../errors.js';
import type { AcquisitionLogger } from '../logging/acquisition-log.js';
import { AcquisitionPhase, ArtifactState } from '../types/artifact.js';
import type { ArtifactDescriptor, ArtifactReport } from '../types/artifact.js';
import type {
  AcquireFailure,
  AcquireOutcome,
  BatchProgressCallback,
  BatchTally,
  ProgressCallback,
} from '../types/outcome.js';
import { backoffDelayMs, sleep as timerSleep } from './backoff.js';
import type { BackoffPolicy } from './backoff.js';
import { SingleFlight, runBounded } from './concurrency.js';
import type { AcquisitionPorts, ArtifactFetcher, ArtifactFileSystem, IntegrityChecker, Sleeper } from './ports.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AcquisitionOptions {
  /** Root every artifact path is resolved under. */
  readonly installRoot: string;
  /** Transfer attempts per acquire call. Default 3. */
  readonly maxAttempts?: number | undefined;
  /** Bound on each individual request. Default 300 000 ms. */
  readonly requestTimeoutMs?: number | undefined;
  /** Backoff time unit; retry n waits roughly base × 2^n. Default 1 000 ms. */
  readonly backoffBaseMs?: number | undefined;
  /** Jitter fraction in [0, 1). Default 0.25. */
  readonly backoffJitter?: number | undefined;
  /** Worker count for acquireAll. Default 1 (strictly sequential). */
  readonly concurrency?: number | undefined;
  /** Random source for jitter. Default Math.random. */
  readonly random?: (() => number) | undefined;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;
export const DEFAULT_BACKOFF_BASE_MS = 1_000;
export const DEFAULT_BACKOFF_JITTER = 0.25;
export const DEFAULT_CONCURRENCY = 1;

export interface AcquireOptions {
  readonly onProgress?: ProgressCallback | undefined;
  /** Fetch even when a valid file is already installed. */
  readonly force?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface AcquireAllOptions {
  /** Tagged with the artifact name so concurrent transfers can be told apart. */
  readonly onProgress?: BatchProgressCallback | undefined;
  /** Leave already-installed artifacts out of the batch. Default true. */
  readonly skipExisting?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
  /** Overrides the manager's concurrency for this batch. */
  readonly concurrency?: number | undefined;
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class ArtifactAcquisitionManager {
  private readonly installRoot: string;
  private readonly maxAttempts: number;
  private readonly requestTimeoutMs: number;
  private readonly concurrency: number;
  private readonly backoff: BackoffPolicy;

  private readonly fetcher: ArtifactFetcher;
  private readonly verifier: IntegrityChecker;
  private readonly files: ArtifactFileSystem;
  private readonly sleep: Sleeper;

  private readonly flights = new SingleFlight<AcquireOutcome>();
  private readonly phases = new Map<string, AcquisitionPhase>();

  /**
   * @throws {SettingsError} If an option is out of range
   */
  constructor(
    private readonly catalog: ArtifactCatalog,
    ports: AcquisitionPorts,
    options: AcquisitionOptions,
    private readonly logger: AcquisitionLogger,
  ) {
    if (options.installRoot.trim() === '') {
      throw new SettingsError('installRoot', 'acquisition options', 'must not be empty');
    }
    this.installRoot = options.installRoot;
    this.maxAttempts = positiveInteger('maxAttempts', options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
    this.requestTimeoutMs = positiveInteger(
      'requestTimeoutMs',
      options.requestTimeoutMs,
      DEFAULT_REQUEST_TIMEOUT_MS,
    );
    this.concurrency = positiveInteger('concurrency', options.concurrency, DEFAULT_CONCURRENCY);

    const baseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    if (!Number.isFinite(baseMs) || baseMs < 0) {
      throw new SettingsError('backoffBaseMs', 'acquisition options', 'must be a non-negative number');
    }
    this.backoff = {
      baseMs,
      jitter: options.backoffJitter ?? DEFAULT_BACKOFF_JITTER,
      random: options.random ?? Math.random,
    };

    this.fetcher = ports.fetcher;
    this.verifier = ports.verifier;
    this.files = ports.files;
    this.sleep = ports.sleep ?? timerSleep;
  }

  // -------------------------------------------------------------------------
  // Catalog passthrough
  // -------------------------------------------------------------------------

  listRequired(): ReadonlyArray<ArtifactDescriptor> {
    return this.catalog.list();
  }

  describe(name: string): ArtifactDescriptor | undefined {
    return this.catalog.describe(name);
  }

  /** Absolute final path of a catalog artifact. */
  pathOf(name: string): string {
    return resolveArtifactPath(this.require(name), this.installRoot);
  }

  /**
   * The runtime phase of an artifact: the in-flight phase while an
   * acquisition runs, otherwise the last state observed by this manager.
   * Undefined when the artifact has not been looked at yet.
   *
   * @throws {UnknownArtifactError}
   */
  phaseOf(name: string): AcquisitionPhase | undefined {
    this.require(name);
    return this.phases.get(name);
  }

  // -------------------------------------------------------------------------
  // Status
  // -------------------------------------------------------------------------

  /**
   * Compute the on-disk state of every catalog artifact.
   *
   * A staging file alone never counts: Installed requires the final,
   * non-suffixed path to exist and verify.
   */
  async checkStatus(): Promise<ReadonlyMap<string, ArtifactState>> {
    const status = new Map<string, ArtifactState>();
    for (const descriptor of this.catalog.list()) {
      const state = await this.stateOf(descriptor);
      this.observe(descriptor.name, state);
      status.set(descriptor.name, state);
    }
    return status;
  }

  async listMissing(): Promise<ReadonlyArray<string>> {
    return namesWithState(await this.checkStatus(), ArtifactState.Absent);
  }

  async listCorrupted(): Promise<ReadonlyArray<string>> {
    return namesWithState(await this.checkStatus(), ArtifactState.Corrupted);
  }

  /** Status display records, including bytes held in staging files. */
  async report(): Promise<ReadonlyArray<ArtifactReport>> {
    const reports: ArtifactReport[] = [];
    for (const descriptor of this.catalog.list()) {
      const path = resolveArtifactPath(descriptor, this.installRoot);
      const stagingPath = stagingPathFor(path);
      const state = await this.stateOf(descriptor);
      this.observe(descriptor.name, state);
      reports.push({
        name: descriptor.name,
        kind: descriptor.kind,
        state,
        path,
        stagingPath,
        stagedBytes: (await this.files.sizeOf(stagingPath)) ?? 0,
        expectedSizeBytes: descriptor.expectedSizeBytes,
        hasDigest: descriptor.digest !== undefined,
      });
    }
    return reports;
  }

  /**
   * Verify every installed artifact.
   *
   * Absent artifacts are false. Artifacts without a digest are true: nothing
   * disproves them, and the log records that they were not verified.
   */
  async auditIntegrity(): Promise<ReadonlyMap<string, boolean>> {
    this.logger.info('audit.start', `Auditing ${this.catalog.size} artifact(s)`);
    const results = new Map<string, boolean>();

    for (const descriptor of this.catalog.list()) {
      const name = descriptor.name;
      const path = resolveArtifactPath(descriptor, this.installRoot);

      if (!(await this.files.isFile(path))) {
        this.logger.warn('audit.missing', `${name} is not installed`, { artifact: name, path });
        this.observe(name, ArtifactState.Absent);
        results.set(name, false);
        continue;
      }

      if (descriptor.digest === undefined) {
        this.logger.info('audit.unverifiable', `${name} is present but declares no digest; it cannot be verified`, {
          artifact: name,
          path,
        });
        this.observe(name, ArtifactState.Installed);
        results.set(name, true);
        continue;
      }

      const check = await this.verifier.check(path, descriptor.digest, descriptor.digestAlgorithm);
      if (check.valid) {
        this.logger.info('audit.valid', `${name} verified (${descriptor.digestAlgorithm})`, { artifact: name, path });
        this.observe(name, ArtifactState.Installed);
      } else {
        this.logger.error('audit.corrupted', `${name} failed verification: ${check.verdict}`, {
          artifact: name,
          path,
          algorithm: descriptor.digestAlgorithm,
          expected: descriptor.digest,
          actual: check.computed,
        });
        this.observe(name, ArtifactState.Corrupted);
      }
      results.set(name, check.valid);
    }

    return results;
  }

  // -------------------------------------------------------------------------
  // Acquisition
  // -------------------------------------------------------------------------

  /**
   * Make sure one artifact is installed and valid.
   *
   * Concurrent calls for the same name share a single acquisition; callers
   * that join an in-flight acquisition receive its outcome, and their own
   * options are not applied.
   *
   * @throws {UnknownArtifactError} If `name` is not in the catalog
   */
  async acquire(name: string, options: AcquireOptions = {}): Promise<AcquireOutcome> {
    const descriptor = this.require(name);
    return this.flights.run(name, () => this.acquireDescriptor(descriptor, options));
  }

  /**
   * Acquire every required artifact on a bounded worker pool.
   *
   * One failing artifact never aborts the batch. Cancellation stops new
   * artifacts from starting; those never started are not counted.
   */
  async acquireAll(options: AcquireAllOptions = {}): Promise<BatchTally> {
    const skipExisting = options.skipExisting ?? true;
    const concurrency = positiveInteger('concurrency', options.concurrency, this.concurrency);
    const signal = options.signal;

    let required = this.catalog.list();
    if (skipExisting) {
      const status = await this.checkStatus();
      required = required.filter((d) => status.get(d.name) !== ArtifactState.Installed);
    }

    if (required.length === 0) {
      this.logger.info('batch.nothing-to-do', 'All artifacts are already installed');
      return { succeeded: this.catalog.size, failed: 0, cancelled: 0, outcomes: [] };
    }

    this.logger.info(
      'batch.start',
      `Acquiring ${required.length} artifact(s) with ${Math.min(concurrency, required.length)} worker(s)`,
      { count: required.length, concurrency },
    );

    const outcomes = await runBounded(
      required,
      concurrency,
      (descriptor, index) => {
        this.logger.info('batch.item', `Artifact ${index + 1}/${required.length}: ${descriptor.name}`, {
          artifact: descriptor.name,
        });
        const onProgress = options.onProgress;
        return this.acquire(descriptor.name, {
          signal,
          ...(onProgress !== undefined
            ? {
                onProgress: (bytes: number, total: number, message: string) => {
                  onProgress(descriptor.name, bytes, total, message);
                },
              }
            : {}),
        });
      },
      () => signal?.aborted !== true,
    );

    const tally: BatchTally = {
      succeeded: outcomes.filter((o) => o.status === 'installed').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
      cancelled: outcomes.filter((o) => o.status === 'cancelled').length,
      outcomes,
    };
    this.logger.info(
      'batch.done',
      `Batch finished: ${tally.succeeded} succeeded, ${tally.failed} failed, ${tally.cancelled} cancelled`,
      { succeeded: tally.succeeded, failed: tally.failed, cancelled: tally.cancelled },
    );
    return tally;
  }

  /**
   * Delete the staging files of artifacts that are not currently being
   * acquired.
   *
   * @returns The staging paths that were removed
   */
  async cleanStaging(): Promise<ReadonlyArray<string>> {
    const removed: string[] = [];
    for (const descriptor of this.catalog.list()) {
      if (this.flights.isRunning(descriptor.name)) {
        this.logger.debug('clean.skipped', `${descriptor.name} is being acquired; keeping its staging file`, {
          artifact: descriptor.name,
        });
        continue;
      }
      const stagingPath = stagingPathFor(resolveArtifactPath(descriptor, this.installRoot));
      if (await this.files.isFile(stagingPath)) {
        // An acquisition may have started while the file was being looked at.
        if (this.flights.isRunning(descriptor.name)) continue;
        await this.files.remove(stagingPath);
        removed.push(stagingPath);
        this.logger.info('clean.removed', `Removed staging file ${stagingPath}`, {
          artifact: descriptor.name,
          path: stagingPath,
        });
      }
    }
    this.logger.info('clean.done', `Removed ${removed.length} staging file(s)`);
    return removed;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * A port that throws (a directory that cannot be created, a file that
   * cannot be removed or read) ends the acquisition as a failed outcome
   * carrying an io-failure.
   */
  private async acquireDescriptor(descriptor: ArtifactDescriptor, options: AcquireOptions): Promise<AcquireOutcome> {
    const path = resolveArtifactPath(descriptor, this.installRoot);
    const counter: AttemptCounter = { attempts: 0 };
    try {
      return await this.runAcquisition(descriptor, path, options, counter);
    } catch (err: unknown) {
      const name = descriptor.name;
      const error = new TransferError(TransferFailureKind.IoFailure, `Local file operation for ${name} failed`, {
        sourceUri: descriptor.sourceUri,
        cause: err,
      });
      this.phases.set(name, AcquisitionPhase.Absent);
      this.logger.error('acquire.io-failed', `Giving up on ${name}: ${describeError(error)}`, {
        artifact: name,
        path,
        attempt: counter.attempts,
        kind: error.kind,
      });
      return {
        name,
        status: 'failed',
        path,
        attempts: counter.attempts,
        fetched: false,
        failure: { kind: 'transfer', error },
      };
    }
  }

  private async runAcquisition(
    descriptor: ArtifactDescriptor,
    path: string,
    options: AcquireOptions,
    counter: AttemptCounter,
  ): Promise<AcquireOutcome> {
    const name = descriptor.name;
    const signal = options.signal;

    if (await this.files.isFile(path)) {
      if (options.force !== true) {
        this.phases.set(name, AcquisitionPhase.Verifying);
        const existing = await this.verifier.check(path, descriptor.digest, descriptor.digestAlgorithm);
        if (existing.valid) {
          this.phases.set(name, AcquisitionPhase.Installed);
          this.logger.info('acquire.already-installed', `${name} is already installed at ${path}`, {
            artifact: name,
            path,
          });
          return { name, status: 'installed', path, attempts: 0, fetched: false };
        }
        this.logger.warn('acquire.existing-invalid', `${name} failed verification (${existing.verdict}); fetching again`, {
          artifact: name,
          path,
          expected: descriptor.digest,
          actual: existing.computed,
        });
      } else {
        this.logger.info('acquire.forced', `Replacing ${name} at ${path}`, { artifact: name, path });
      }
      await this.files.remove(path);
    }

    await this.files.ensureDirectory(dirname(path));

    let failure: AcquireFailure | undefined;
    let attempts = 0;

    while (attempts < this.maxAttempts) {
      if (signal?.aborted === true) return this.cancelled(descriptor, path, attempts);
      attempts++;
      counter.attempts = attempts;

      this.phases.set(name, AcquisitionPhase.Fetching);
      this.logger.info('acquire.attempt', `Fetching ${name} (attempt ${attempts}/${this.maxAttempts})`, {
        artifact: name,
        path,
        attempt: attempts,
        sourceUri: descriptor.sourceUri,
      });

      const result = await this.fetcher.fetch({
        sourceUri: descriptor.sourceUri,
        destinationPath: path,
        expectedSizeBytes: descriptor.expectedSizeBytes,
        timeoutMs: this.requestTimeoutMs,
        onProgress: options.onProgress,
        signal,
      });

      if (result.status === 'cancelled') return this.cancelled(descriptor, path, attempts);

      if (result.status === 'failed') {
        failure = { kind: 'transfer', error: result.error };
        this.logger.error(
          'acquire.transfer-failed',
          `Transfer of ${name} failed on attempt ${attempts}/${this.maxAttempts}: ${describeError(result.error)}`,
          {
            artifact: name,
            path,
            attempt: attempts,
            kind: result.error.kind,
            httpStatus: result.error.httpStatus,
            sourceUri: descriptor.sourceUri,
          },
        );
        if (attempts < this.maxAttempts) {
          const waitMs = backoffDelayMs(attempts, this.backoff);
          this.logger.info('acquire.backoff', `Retrying ${name} in ${Math.round(waitMs)} ms`, {
            artifact: name,
            attempt: attempts,
            waitMs,
          });
          if (!(await this.sleep(waitMs, signal))) return this.cancelled(descriptor, path, attempts);
        }
        continue;
      }

      this.phases.set(name, AcquisitionPhase.Verifying);
      const check = await this.verifier.check(path, descriptor.digest, descriptor.digestAlgorithm);
      if (check.valid) {
        await this.warnOnSizeMismatch(descriptor, path);
        this.phases.set(name, AcquisitionPhase.Installed);
        this.logger.info(
          'acquire.installed',
          descriptor.digest === undefined
            ? `${name} installed at ${path} (no digest to verify)`
            : `${name} installed and verified at ${path}`,
          { artifact: name, path, attempt: attempts, bytesTransferred: result.outcome.bytesTransferred },
        );
        return { name, status: 'installed', path, attempts, fetched: true };
      }

      failure = {
        kind: 'integrity',
        algorithm: descriptor.digestAlgorithm,
        expected: descriptor.digest ?? '',
        actual: check.computed,
      };
      this.phases.set(name, AcquisitionPhase.Corrupted);
      this.logger.error(
        'acquire.integrity-failed',
        `${name} failed ${descriptor.digestAlgorithm} verification on attempt ${attempts}/${this.maxAttempts} (${check.verdict})`,
        {
          artifact: name,
          path,
          attempt: attempts,
          expected: descriptor.digest,
          actual: check.computed,
        },
      );
      await this.files.remove(path);

      if (check.verdict === 'unsupported-algorithm') {
        // Another transfer produces the same verdict.
        break;
      }
    }

    this.phases.set(name, AcquisitionPhase.Absent);
    this.logger.error('acquire.failed', `Giving up on ${name} after ${attempts} attempt(s)`, {
      artifact: name,
      path,
      attempts,
      cause: failure === undefined ? undefined : describeFailure(failure),
    });
    return { name, status: 'failed', path, attempts, fetched: false, failure };
  }

  private cancelled(descriptor: ArtifactDescriptor, path: string, attempts: number): AcquireOutcome {
    this.phases.set(descriptor.name, AcquisitionPhase.Absent);
    this.logger.warn('acquire.cancelled', `Acquisition of ${descriptor.name} cancelled; staging file kept for resume`, {
      artifact: descriptor.name,
      path,
      attempts,
    });
    return { name: descriptor.name, status: 'cancelled', path, attempts, fetched: false };
  }

  private async stateOf(descriptor: ArtifactDescriptor): Promise<ArtifactState> {
    const path = resolveArtifactPath(descriptor, this.installRoot);
    if (!(await this.files.isFile(path))) return ArtifactState.Absent;
    if (descriptor.digest === undefined) return ArtifactState.Installed;
    const check = await this.verifier.check(path, descriptor.digest, descriptor.digestAlgorithm);
    return check.valid ? ArtifactState.Installed : ArtifactState.Corrupted;
  }

  private async warnOnSizeMismatch(descriptor: ArtifactDescriptor, path: string): Promise<void> {
    if (descriptor.expectedSizeBytes === 0) return;
    const actual = await this.files.sizeOf(path);
    if (actual !== null && actual !== descriptor.expectedSizeBytes) {
      this.logger.warn(
        'acquire.size-mismatch',
        `${descriptor.name} is ${actual} bytes; the manifest declares ${descriptor.expectedSizeBytes}`,
        { artifact: descriptor.name, path, actual, expected: descriptor.expectedSizeBytes },
      );
    }
  }

  /** Record an observed state unless an acquisition owns the phase right now. */
  private observe(name: string, state: ArtifactState): void {
    if (this.flights.isRunning(name)) return;
    this.phases.set(name, PHASE_FOR_STATE[state]);
  }

  private require(name: string): ArtifactDescriptor {
    const descriptor = this.catalog.describe(name);
    if (descriptor === undefined) throw new UnknownArtifactError(name, this.catalog.names());
    return descriptor;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface AttemptCounter {
  attempts: number;
}

const PHASE_FOR_STATE: Readonly<Record<ArtifactState, AcquisitionPhase>> = {
  [ArtifactState.Absent]: AcquisitionPhase.Absent,
  [ArtifactState.Installed]: AcquisitionPhase.Installed,
  [ArtifactState.Corrupted]: AcquisitionPhase.Corrupted,
};

function positiveInteger(setting: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new SettingsError(setting, 'acquisition options', `must be a positive integer, got ${value}`);
  }
  return value;
}

function namesWithState(status: ReadonlyMap<string, ArtifactState>, wanted: ArtifactState): ReadonlyArray<string> {
  return [...status.entries()].filter(([, state]) => state === wanted).map(([name]) => name);
}

/** One-line description of an acquisition failure. */
export function describeFailure(failure: AcquireFailure): string {
  if (failure.kind === 'transfer') return describeError(failure.error);
  const actual = failure.actual !== undefined ? `, got ${failure.actual}` : '';
  return `${failure.algorithm} mismatch: expected ${failure.expected}${actual}`;
}
