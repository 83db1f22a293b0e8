/**
 * Loadout Runtime Host — Settings
 *
 * Every setting is resolved independently with the precedence:
 *
 *   command-line flag → environment variable → <home>/state/settings.json → default
 *
 * Values are validated where they are read. A bad value is a SettingsError
 * naming the setting and the layer it came from; it never falls through to a
 * lower layer.
 */

import { join, resolve } from 'node:path';
import {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  SettingsError,
} from '@loadout/core';
import type { StateIO } from '../state/state-io.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadoutSettings {
  /** Root every artifact path is resolved under. */
  readonly installRoot: string;
  readonly manifestPath: string;
  readonly maxAttempts: number;
  readonly requestTimeoutMs: number;
  readonly backoffBaseMs: number;
  readonly concurrency: number;
  /** Accept artifacts whose digest algorithm cannot be computed. */
  readonly allowUnverifiable: boolean;
}

export type SettingName = keyof LoadoutSettings;

export type SettingSource = 'flag' | 'env' | 'file' | 'default';

/** Raw values from the command line. Strings are parsed like env values. */
export type SettingOverrides = { readonly [K in SettingName]?: string | number | boolean | undefined };

export interface ResolvedSettings {
  readonly values: LoadoutSettings;
  readonly sources: Readonly<Record<SettingName, SettingSource>>;
}

export interface ResolveSettingsOptions {
  readonly overrides?: SettingOverrides | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Home-scoped state holding settings.json. Omit to skip the file layer. */
  readonly stateIO?: StateIO | undefined;
  /** Base for relative paths and path defaults. Default process.cwd(). */
  readonly cwd?: string | undefined;
}

type Parsed<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly message: string };

interface SettingDefinition<T> {
  readonly env: string;
  readonly parse: (raw: unknown, cwd: string) => Parsed<T>;
  readonly fallback: (cwd: string) => T;
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const SETTINGS_FILE = 'settings.json';

const FILE_SOURCE = `state/${SETTINGS_FILE}`;

const SETTING_DEFINITIONS: { readonly [K in SettingName]: SettingDefinition<LoadoutSettings[K]> } = {
  installRoot: { env: 'LOADOUT_INSTALL_ROOT', parse: parsePath, fallback: (cwd) => cwd },
  manifestPath: {
    env: 'LOADOUT_MANIFEST',
    parse: parsePath,
    fallback: (cwd) => join(cwd, 'config', 'models.yaml'),
  },
  maxAttempts: { env: 'LOADOUT_MAX_ATTEMPTS', parse: integerAtLeast(1), fallback: () => DEFAULT_MAX_ATTEMPTS },
  requestTimeoutMs: {
    env: 'LOADOUT_TIMEOUT_MS',
    parse: integerAtLeast(1),
    fallback: () => DEFAULT_REQUEST_TIMEOUT_MS,
  },
  backoffBaseMs: { env: 'LOADOUT_BACKOFF_MS', parse: integerAtLeast(0), fallback: () => DEFAULT_BACKOFF_BASE_MS },
  concurrency: { env: 'LOADOUT_CONCURRENCY', parse: integerAtLeast(1), fallback: () => DEFAULT_CONCURRENCY },
  allowUnverifiable: { env: 'LOADOUT_ALLOW_UNVERIFIABLE', parse: parseBoolean, fallback: () => false },
};

export const SETTING_NAMES: ReadonlyArray<SettingName> = [
  'installRoot',
  'manifestPath',
  'maxAttempts',
  'requestTimeoutMs',
  'backoffBaseMs',
  'concurrency',
  'allowUnverifiable',
];

export function isSettingName(value: string): value is SettingName {
  return SETTING_NAMES.some((name) => name === value);
}

/** The environment variable that sets a setting. */
export function envVarFor(name: SettingName): string {
  return SETTING_DEFINITIONS[name].env;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * @throws {SettingsError} If any layer holds an invalid value, or settings.json is malformed
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): ResolvedSettings {
  const cwd = options.cwd ?? process.cwd();
  const layers: Layers = {
    overrides: options.overrides ?? {},
    env: options.env ?? process.env,
    file: readSettingsFile(options.stateIO),
    cwd,
  };

  const installRoot = resolveOne('installRoot', layers);
  const manifestPath = resolveOne('manifestPath', layers);
  const maxAttempts = resolveOne('maxAttempts', layers);
  const requestTimeoutMs = resolveOne('requestTimeoutMs', layers);
  const backoffBaseMs = resolveOne('backoffBaseMs', layers);
  const concurrency = resolveOne('concurrency', layers);
  const allowUnverifiable = resolveOne('allowUnverifiable', layers);

  return {
    values: {
      installRoot: installRoot.value,
      manifestPath: manifestPath.value,
      maxAttempts: maxAttempts.value,
      requestTimeoutMs: requestTimeoutMs.value,
      backoffBaseMs: backoffBaseMs.value,
      concurrency: concurrency.value,
      allowUnverifiable: allowUnverifiable.value,
    },
    sources: {
      installRoot: installRoot.source,
      manifestPath: manifestPath.source,
      maxAttempts: maxAttempts.source,
      requestTimeoutMs: requestTimeoutMs.source,
      backoffBaseMs: backoffBaseMs.source,
      concurrency: concurrency.source,
      allowUnverifiable: allowUnverifiable.source,
    },
  };
}

/**
 * Validate a value and persist it in settings.json. Paths are stored
 * absolute, resolved against `cwd`.
 *
 * @throws {SettingsError} If the value is invalid for the setting
 */
export function writeSetting(stateIO: StateIO, name: SettingName, raw: string, cwd: string = process.cwd()): void {
  const parsed = SETTING_DEFINITIONS[name].parse(raw, cwd);
  if (!parsed.ok) throw new SettingsError(name, 'command line', parsed.message);
  const file = readSettingsFile(stateIO);
  stateIO.writeJson(SETTINGS_FILE, { ...file, [name]: parsed.value });
}

/**
 * Remove a setting from settings.json.
 *
 * @returns Whether the file held a value for it
 */
export function unsetSetting(stateIO: StateIO, name: SettingName): boolean {
  const file = readSettingsFile(stateIO);
  if (!(name in file)) return false;
  stateIO.writeJson(SETTINGS_FILE, Object.fromEntries(Object.entries(file).filter(([key]) => key !== name)));
  return true;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface Layers {
  readonly overrides: SettingOverrides;
  readonly env: NodeJS.ProcessEnv;
  readonly file: Readonly<Record<string, unknown>>;
  readonly cwd: string;
}

function resolveOne<K extends SettingName>(
  name: K,
  layers: Layers,
): { readonly value: LoadoutSettings[K]; readonly source: SettingSource } {
  const definition: SettingDefinition<LoadoutSettings[K]> = SETTING_DEFINITIONS[name];
  const candidates: ReadonlyArray<readonly [SettingSource, string, unknown]> = [
    ['flag', 'command line', layers.overrides[name]],
    ['env', `environment variable ${definition.env}`, layers.env[definition.env]],
    ['file', FILE_SOURCE, layers.file[name]],
  ];

  for (const [source, label, raw] of candidates) {
    if (raw === undefined || raw === null || raw === '') continue;
    const parsed = definition.parse(raw, layers.cwd);
    if (!parsed.ok) throw new SettingsError(name, label, parsed.message);
    return { value: parsed.value, source };
  }
  return { value: definition.fallback(layers.cwd), source: 'default' };
}

function readSettingsFile(stateIO: StateIO | undefined): Readonly<Record<string, unknown>> {
  if (stateIO === undefined) return {};
  let content: unknown;
  try {
    content = stateIO.readJson(SETTINGS_FILE);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new SettingsError('settings', FILE_SOURCE, `the file is not valid JSON (${err.message})`);
    }
    throw err;
  }
  if (content === undefined) return {};
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    throw new SettingsError('settings', FILE_SOURCE, 'the file must hold a JSON object');
  }
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(content)) {
    if (!isSettingName(key)) {
      throw new SettingsError(key, FILE_SOURCE, `unknown setting; expected one of ${SETTING_NAMES.join(', ')}`);
    }
    record[key] = value;
  }
  return record;
}

function parsePath(raw: unknown, cwd: string): Parsed<string> {
  if (typeof raw !== 'string' || raw.trim() === '') return { ok: false, message: 'expected a path' };
  return { ok: true, value: resolve(cwd, raw) };
}

function integerAtLeast(min: number): (raw: unknown) => Parsed<number> {
  return (raw) => {
    const value = typeof raw === 'string' && /^\s*\d+\s*$/.test(raw) ? Number(raw) : raw;
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
      const kind = min > 0 ? 'a positive integer' : 'a non-negative integer';
      return { ok: false, message: `expected ${kind}, got ${JSON.stringify(raw)}` };
    }
    return { ok: true, value };
  };
}

function parseBoolean(raw: unknown): Parsed<boolean> {
  if (typeof raw === 'boolean') return { ok: true, value: raw };
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return { ok: true, value: true };
    if (normalized === 'false' || normalized === '0') return { ok: true, value: false };
  }
  return { ok: false, message: `expected true, false, 1 or 0, got ${JSON.stringify(raw)}` };
}
