/**
 * @loadout/core
 *
 * Artifact catalog, storage conventions, retry policy and the acquisition
 * manager.
 *
 * This package performs no filesystem or network I/O of its own. The
 * fetcher, verifier and filesystem are ports (see acquisition/ports.ts);
 * node:path is used for pure path arithmetic and node:timers/promises for
 * the default backoff sleeper.
 *
 * Concrete adapters, manifest loading and configuration live in
 * @loadout/runtime-host.
 */

// Types
export type { ArtifactDescriptor, ArtifactReport } from './types/artifact.js';
export { AcquisitionPhase, ArtifactState } from './types/artifact.js';

export type {
  AcquireFailure,
  AcquireOutcome,
  BatchProgressCallback,
  BatchTally,
  FetchOutcome,
  FetchRequest,
  FetchResult,
  IntegrityCheck,
  IntegrityVerdict,
  ProgressCallback,
} from './types/outcome.js';

export type { ValidationError, ValidationResult } from './types/validation.js';

// Errors
export {
  ManifestError,
  SettingsError,
  TransferError,
  TransferFailureKind,
  UnknownArtifactError,
  describeError,
} from './errors.js';

// Catalog
export { ArtifactCatalog } from './catalog/catalog.js';
export {
  DEFAULT_DIGEST_ALGORITHM,
  DIGEST_HEX_LENGTHS,
  ManifestValidator,
  normalizeDigestAlgorithm,
} from './catalog/manifest.js';
export {
  DEFAULT_KIND_DIRECTORY,
  KIND_DIRECTORIES,
  STAGING_SUFFIX,
  artifactDirectory,
  resolveArtifactPath,
  stagingPathFor,
} from './catalog/locator.js';

// Ports (no implementations — those live in runtime-host)
export type {
  AcquisitionPorts,
  ArtifactFetcher,
  ArtifactFileSystem,
  IntegrityChecker,
  Sleeper,
} from './acquisition/ports.js';

// Acquisition
export type { BackoffPolicy } from './acquisition/backoff.js';
export { backoffDelayMs, sleep } from './acquisition/backoff.js';
export { SingleFlight, runBounded } from './acquisition/concurrency.js';
export type { AcquireAllOptions, AcquireOptions, AcquisitionOptions } from './acquisition/manager.js';
export {
  ArtifactAcquisitionManager,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_JITTER,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  describeFailure,
} from './acquisition/manager.js';

// Logging
export type { AcquisitionLogEntry, LogLevel, LogSink } from './logging/log-sink.js';
export { LOG_LEVELS, MemoryLogSink, fanOut } from './logging/log-sink.js';
export type { LogFields } from './logging/acquisition-log.js';
export { AcquisitionLogger } from './logging/acquisition-log.js';
