/**
 * @loadout/runtime-host
 *
 * Node.js implementations of the @loadout/core ports, plus manifest loading,
 * settings, the acquisition log and the runtime factory.
 *
 * No core code imports from this package.
 */

// Port implementations
export { IntegrityVerifier, SUPPORTED_DIGEST_ALGORITHMS, DIGEST_READ_BUFFER_BYTES } from './integrity/verifier.js';
export type { IntegrityVerifierOptions } from './integrity/verifier.js';
export { ResumableFetcher } from './transfer/fetcher.js';
export type { ResumableFetcherOptions } from './transfer/fetcher.js';
export { NodeArtifactFileSystem } from './fs/artifact-fs.js';

// Manifest
export { loadManifest } from './manifest/load-manifest.js';

// StateIO — home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Logging
export { ACQUISITION_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export type { AcquisitionLogRecord, LogFilter, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { filterLog, isLogLevel, readLog } from './logging/log-reader.js';

// Configuration
export type { HomeEnvironment, ResolveHomeOptions } from './config/home.js';
export {
  HOME_ENV_VAR,
  getOsConfigPath,
  readHomeFromConfig,
  resolveLoadoutHome,
  writeHomeToConfig,
} from './config/home.js';
export type {
  LoadoutSettings,
  ResolveSettingsOptions,
  ResolvedSettings,
  SettingName,
  SettingOverrides,
  SettingSource,
} from './config/settings.js';
export {
  SETTINGS_FILE,
  SETTING_NAMES,
  envVarFor,
  isSettingName,
  resolveSettings,
  unsetSetting,
  writeSetting,
} from './config/settings.js';

// Runtime factory
export type { AcquisitionRuntime, AcquisitionRuntimeOptions } from './runtime.js';
export { createAcquisitionRuntime } from './runtime.js';
