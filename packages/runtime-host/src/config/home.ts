/**
 * Loadout Runtime Host — Home Directory Resolution
 *
 * Resolves the loadout home directory using the following precedence:
 *
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. LOADOUT_HOME environment variable
 *   3. OS application config file (remembers a prior --home --remember-home)
 *   4. Default: ~/.loadout
 *
 * Layout:
 *
 *   <home>/
 *     state/settings.json     persisted settings
 *     logs/acquisition.jsonl  acquisition log
 *
 * The home directory never holds artifacts; those live under the install root.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir, platform } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { SettingsError } from '@loadout/core';
import { isNodeError } from '../util/node-error.js';

export const HOME_ENV_VAR = 'LOADOUT_HOME';

/** Where the OS config file and the default home are looked up. */
export interface HomeEnvironment {
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** The user's home directory. Default os.homedir(). */
  readonly userHome?: string | undefined;
  /** Default os.platform(). */
  readonly platform?: NodeJS.Platform | undefined;
}

// ---------------------------------------------------------------------------
// OS Config File
// ---------------------------------------------------------------------------

/**
 * Platform-specific path to the loadout application config file.
 *
 *   macOS:   ~/Library/Preferences/loadout/config.json
 *   Windows: %APPDATA%\loadout\config.json (fallback ~/AppData/Roaming)
 *   Linux:   ~/.config/loadout/config.json
 */
export function getOsConfigPath(environment: HomeEnvironment = {}): string {
  const userHome = environment.userHome ?? homedir();
  const env = environment.env ?? process.env;
  switch (environment.platform ?? platform()) {
    case 'darwin':
      return join(userHome, 'Library', 'Preferences', 'loadout', 'config.json');
    case 'win32':
      return join(env['APPDATA'] ?? join(userHome, 'AppData', 'Roaming'), 'loadout', 'config.json');
    default:
      return join(userHome, '.config', 'loadout', 'config.json');
  }
}

/**
 * The home path remembered in the OS config file, or null if there is none.
 *
 * @throws {SettingsError} If the file exists but is not valid JSON
 */
export function readHomeFromConfig(environment: HomeEnvironment = {}): string | null {
  const configPath = getOsConfigPath(environment);
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SettingsError('home', configPath, 'the file is not valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const home: unknown = Reflect.get(parsed, 'home');
  return typeof home === 'string' && home !== '' ? home : null;
}

/** Remember a home path in the OS config file. */
export function writeHomeToConfig(home: string, environment: HomeEnvironment = {}): void {
  const configPath = getOsConfigPath(environment);
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2) + '\n', 'utf-8');
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions extends HomeEnvironment {
  /** Explicit override — highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file. Only meaningful together
   * with an explicit `home`. Default false.
   */
  readonly persist?: boolean | undefined;
}

/**
 * Resolve the loadout home directory and make sure it exists.
 *
 * @returns Absolute path of the home directory
 */
export function resolveLoadoutHome(options: ResolveHomeOptions = {}): string {
  const env = options.env ?? process.env;
  const fromEnv = env[HOME_ENV_VAR];

  let home: string;
  if (options.home !== undefined && options.home !== '') {
    home = options.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromConfig(options) ?? join(options.userHome ?? homedir(), '.loadout');
  }
  home = resolve(home);

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (options.persist === true && options.home !== undefined && options.home !== '') {
    writeHomeToConfig(home, options);
  }

  return home;
}
