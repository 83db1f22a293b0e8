/**
 * Loadout Core — Transfer and Acquisition Outcomes
 *
 * Recoverable conditions are values, not exceptions. The fetcher returns a
 * FetchResult; the manager folds attempts into an AcquireOutcome; batch
 * operations fold outcomes into a BatchTally.
 */

import type { TransferError } from '../errors.js';

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

/**
 * Progress callback contract.
 *
 * `totalBytes` is 0 when the total is unknown. Consumers must handle the
 * indeterminate case (e.g. show raw bytes instead of a percentage).
 */
export type ProgressCallback = (bytesSoFar: number, totalBytes: number, message: string) => void;

/** Batch progress: the same contract tagged with the artifact name. */
export type BatchProgressCallback = (
  artifact: string,
  bytesSoFar: number,
  totalBytes: number,
  message: string,
) => void;

// ---------------------------------------------------------------------------
// Fetch
// ---------------------------------------------------------------------------

/** One transfer attempt: move bytes from sourceUri to destinationPath. */
export interface FetchRequest {
  readonly sourceUri: string;
  /** Final path. The staging file is this path + '.part'. */
  readonly destinationPath: string;
  /** Advisory size hint; 0 when unknown. */
  readonly expectedSizeBytes: number;
  /** Bound on this single request. */
  readonly timeoutMs: number;
  readonly onProgress?: ProgressCallback | undefined;
  /** Checked at every chunk boundary. */
  readonly signal?: AbortSignal | undefined;
}

export interface FetchOutcome {
  /** Bytes received during this attempt (excludes bytes resumed from disk). */
  readonly bytesTransferred: number;
  /** Final total, 0 when the server never announced one. */
  readonly totalBytes: number;
  /** Staging offset the attempt resumed from (0 for a full transfer). */
  readonly resumedFrom: number;
}

export type FetchResult =
  | { readonly status: 'completed'; readonly outcome: FetchOutcome }
  | { readonly status: 'failed'; readonly error: TransferError }
  | { readonly status: 'cancelled'; readonly bytesOnDisk: number };

// ---------------------------------------------------------------------------
// Integrity
// ---------------------------------------------------------------------------

export type IntegrityVerdict =
  | 'no-digest'
  | 'match'
  | 'mismatch'
  | 'missing-file'
  | 'unsupported-algorithm';

export interface IntegrityCheck {
  readonly verdict: IntegrityVerdict;
  /** Whether the file is accepted as valid under the verifier's policy. */
  readonly valid: boolean;
  /** Lowercase hex digest, when one was computed. */
  readonly computed?: string | undefined;
}

// ---------------------------------------------------------------------------
// Acquisition
// ---------------------------------------------------------------------------

export type AcquireFailure =
  | { readonly kind: 'transfer'; readonly error: TransferError }
  | {
      readonly kind: 'integrity';
      readonly algorithm: string;
      readonly expected: string;
      readonly actual?: string | undefined;
    };

export interface AcquireOutcome {
  readonly name: string;
  readonly status: 'installed' | 'failed' | 'cancelled';
  /** Absolute final path. */
  readonly path: string;
  /** Transfer attempts made. 0 when the existing file was already valid. */
  readonly attempts: number;
  /** True when bytes were fetched during this call. */
  readonly fetched: boolean;
  /** Last failure observed; set when status is 'failed'. */
  readonly failure?: AcquireFailure | undefined;
}

export interface BatchTally {
  readonly succeeded: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly outcomes: ReadonlyArray<AcquireOutcome>;
}
