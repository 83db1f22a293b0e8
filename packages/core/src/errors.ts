/**
 * Loadout Core — Error Taxonomy
 *
 * Two families:
 *
 *   Structural (thrown): ManifestError, UnknownArtifactError, SettingsError.
 *     Retrying cannot help, so these unwind to the caller immediately.
 *
 *   Recoverable (returned as values): TransferError.
 *     Produced by the fetcher inside a FetchResult and consumed by the
 *     manager's retry loop. Never thrown past the fetcher boundary.
 *
 * Integrity mismatches and cancellation are not errors at all: they are
 * variants of AcquireOutcome (see types/outcome.ts).
 */

import type { ValidationError } from './types/validation.js';

/**
 * The manifest exists but cannot be read, parsed, or fails structural
 * validation. A missing manifest is not a ManifestError (see loadManifest).
 */
export class ManifestError extends Error {
  readonly manifestPath: string | undefined;
  readonly issues: ReadonlyArray<ValidationError>;

  constructor(
    message: string,
    options: {
      readonly manifestPath?: string | undefined;
      readonly issues?: ReadonlyArray<ValidationError> | undefined;
      readonly cause?: unknown;
    } = {},
  ) {
    super(formatManifestMessage(message, options.manifestPath, options.issues ?? []), {
      cause: options.cause,
    });
    this.name = 'ManifestError';
    this.manifestPath = options.manifestPath;
    this.issues = options.issues ?? [];
  }
}

function formatManifestMessage(
  message: string,
  manifestPath: string | undefined,
  issues: ReadonlyArray<ValidationError>,
): string {
  const where = manifestPath !== undefined ? ` (${manifestPath})` : '';
  if (issues.length === 0) return `${message}${where}`;
  const lines = issues.map((i) =>
    i.context !== undefined ? `  - ${i.context}: ${i.message}` : `  - ${i.message}`,
  );
  return `${message}${where}\n${lines.join('\n')}`;
}

/** The caller referenced a name that is not in the catalog. Never retried. */
export class UnknownArtifactError extends Error {
  constructor(
    readonly artifactName: string,
    readonly knownNames: ReadonlyArray<string>,
  ) {
    super(
      `Unknown artifact '${artifactName}'. ` +
        (knownNames.length === 0
          ? 'The catalog is empty.'
          : `Known artifacts: ${knownNames.join(', ')}.`),
    );
    this.name = 'UnknownArtifactError';
  }
}

/**
 * Why a transfer attempt failed.
 *
 * io-failure covers local write errors on the staging file; the other three
 * describe the remote side.
 */
export enum TransferFailureKind {
  Timeout = 'timeout',
  NetworkFailure = 'network-failure',
  ServerError = 'server-error',
  IoFailure = 'io-failure',
}

/** A failed transfer attempt. Carried in FetchResult; drives the retry loop. */
export class TransferError extends Error {
  readonly kind: TransferFailureKind;
  readonly sourceUri: string;
  readonly httpStatus: number | undefined;

  constructor(
    kind: TransferFailureKind,
    message: string,
    options: {
      readonly sourceUri: string;
      readonly httpStatus?: number | undefined;
      readonly cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransferError';
    this.kind = kind;
    this.sourceUri = options.sourceUri;
    this.httpStatus = options.httpStatus;
  }
}

/** A configuration value could not be interpreted. */
export class SettingsError extends Error {
  constructor(
    readonly setting: string,
    readonly source: string,
    message: string,
  ) {
    super(`Invalid setting '${setting}' from ${source}: ${message}`);
    this.name = 'SettingsError';
  }
}

/** Render any thrown value as a one-line description, including its cause chain. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause === undefined || cause === null) return err.message;
  return `${err.message} (caused by: ${describeError(cause)})`;
}
