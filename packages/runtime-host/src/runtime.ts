/**
 * Loadout Runtime Host — Acquisition Runtime Factory
 *
 * Wires settings, logging, the manifest and the Node port implementations
 * into a ready ArtifactAcquisitionManager:
 *
 *   home      → resolveLoadoutHome()
 *   settings  → resolveSettings() (flags → env → settings.json → defaults)
 *   logging   → FileLogSink (acquisition.jsonl) plus any caller sinks
 *   catalog   → loadManifest(settings.manifestPath)
 *   manager   → ResumableFetcher + IntegrityVerifier + NodeArtifactFileSystem
 */

import type { AxiosInstance } from 'axios';
import { AcquisitionLogger, ArtifactAcquisitionManager, fanOut } from '@loadout/core';
import type { ArtifactCatalog, LogSink } from '@loadout/core';
import { resolveLoadoutHome } from './config/home.js';
import { resolveSettings } from './config/settings.js';
import type { ResolvedSettings, SettingOverrides } from './config/settings.js';
import { NodeArtifactFileSystem } from './fs/artifact-fs.js';
import { IntegrityVerifier } from './integrity/verifier.js';
import { FileLogSink } from './logging/file-log-sink.js';
import { loadManifest } from './manifest/load-manifest.js';
import { FileStateIO } from './state/state-io.js';
import { ResumableFetcher } from './transfer/fetcher.js';

export interface AcquisitionRuntimeOptions {
  /** Explicit home directory (--home). */
  readonly home?: string | undefined;
  /** Remember `home` in the OS config file (--remember-home). */
  readonly rememberHome?: boolean | undefined;
  readonly overrides?: SettingOverrides | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly cwd?: string | undefined;
  /** Sinks that receive every entry alongside the acquisition log file. */
  readonly sinks?: ReadonlyArray<LogSink> | undefined;
  readonly http?: AxiosInstance | undefined;
}

export interface AcquisitionRuntime {
  readonly home: string;
  readonly stateIO: FileStateIO;
  readonly settings: ResolvedSettings;
  readonly logger: AcquisitionLogger;
  readonly catalog: ArtifactCatalog;
  readonly manager: ArtifactAcquisitionManager;
}

/**
 * @throws {SettingsError} If a setting is invalid
 * @throws {ManifestError} If the manifest exists but cannot be loaded
 */
export async function createAcquisitionRuntime(options: AcquisitionRuntimeOptions = {}): Promise<AcquisitionRuntime> {
  const home = resolveLoadoutHome({ home: options.home, persist: options.rememberHome, env: options.env });
  const stateIO = new FileStateIO(home);
  const settings = resolveSettings({ overrides: options.overrides, env: options.env, stateIO, cwd: options.cwd });
  const { values } = settings;

  const logger = new AcquisitionLogger(fanOut(new FileLogSink(stateIO), ...(options.sinks ?? [])));
  const catalog = await loadManifest(values.manifestPath, logger);

  const manager = new ArtifactAcquisitionManager(
    catalog,
    {
      fetcher: new ResumableFetcher({ http: options.http, logger }),
      verifier: new IntegrityVerifier({ allowUnverifiable: values.allowUnverifiable }, logger),
      files: new NodeArtifactFileSystem(),
    },
    {
      installRoot: values.installRoot,
      maxAttempts: values.maxAttempts,
      requestTimeoutMs: values.requestTimeoutMs,
      backoffBaseMs: values.backoffBaseMs,
      concurrency: values.concurrency,
    },
    logger,
  );

  return { home, stateIO, settings, logger, catalog, manager };
}
