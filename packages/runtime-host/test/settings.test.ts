/**
 * Loadout Runtime Host — Settings Tests
 *
 *   SET-U1: with no layers set, every setting takes its default
 *   SET-U2: flag beats env beats settings.json, per setting
 *   SET-U3: an invalid value names the setting and its layer
 *   SET-U4: settings.json must be a JSON object of known settings
 *   SET-U5: writeSetting validates and persists; unsetSetting removes
 *
 * Isolation: MemoryStateIO for the file layer, explicit env objects.
 */

import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { SettingsError } from '@loadout/core';
import { envVarFor, resolveSettings, unsetSetting, writeSetting } from '../src/config/settings.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const CWD = '/srv/app';

describe('resolveSettings — SET-U1: defaults', () => {
  it('falls back to the built-in defaults', () => {
    const resolved = resolveSettings({ env: {}, cwd: CWD });

    expect(resolved.values).toEqual({
      installRoot: CWD,
      manifestPath: join(CWD, 'config', 'models.yaml'),
      maxAttempts: 3,
      requestTimeoutMs: 300_000,
      backoffBaseMs: 1_000,
      concurrency: 1,
      allowUnverifiable: false,
    });
    expect(new Set(Object.values(resolved.sources))).toEqual(new Set(['default']));
  });
});

describe('resolveSettings — SET-U2: precedence', () => {
  it('takes each setting from the highest layer that sets it', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('settings.json', { maxAttempts: 7, concurrency: 4, installRoot: '/data/models' });

    const resolved = resolveSettings({
      overrides: { concurrency: 2 },
      env: { LOADOUT_MAX_ATTEMPTS: '5', LOADOUT_ALLOW_UNVERIFIABLE: 'TRUE' },
      stateIO,
      cwd: CWD,
    });

    expect(resolved.values.concurrency).toBe(2);
    expect(resolved.sources.concurrency).toBe('flag');
    expect(resolved.values.maxAttempts).toBe(5);
    expect(resolved.sources.maxAttempts).toBe('env');
    expect(resolved.values.installRoot).toBe('/data/models');
    expect(resolved.sources.installRoot).toBe('file');
    expect(resolved.values.allowUnverifiable).toBe(true);
    expect(resolved.sources.requestTimeoutMs).toBe('default');
  });

  it('resolves relative paths against cwd and ignores empty values', () => {
    const resolved = resolveSettings({
      overrides: { installRoot: '' },
      env: { LOADOUT_INSTALL_ROOT: 'install', LOADOUT_MANIFEST: '' },
      cwd: CWD,
    });

    expect(resolved.values.installRoot).toBe(join(CWD, 'install'));
    expect(resolved.sources.installRoot).toBe('env');
    expect(resolved.sources.manifestPath).toBe('default');
  });

  it('accepts 0 for backoffBaseMs', () => {
    expect(resolveSettings({ env: { LOADOUT_BACKOFF_MS: '0' }, cwd: CWD }).values.backoffBaseMs).toBe(0);
  });
});

describe('resolveSettings — SET-U3: invalid values', () => {
  it('rejects a non-numeric attempt count from the environment', () => {
    expect(() => resolveSettings({ env: { LOADOUT_MAX_ATTEMPTS: 'three' }, cwd: CWD })).toThrow(
      `Invalid setting 'maxAttempts' from environment variable LOADOUT_MAX_ATTEMPTS: expected a positive integer, got "three"`,
    );
  });

  it('rejects zero concurrency from the command line', () => {
    expect(() => resolveSettings({ overrides: { concurrency: 0 }, env: {}, cwd: CWD })).toThrow(
      `Invalid setting 'concurrency' from command line: expected a positive integer, got 0`,
    );
  });

  it('rejects a bad boolean from settings.json', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('settings.json', { allowUnverifiable: 'sometimes' });

    expect(() => resolveSettings({ env: {}, stateIO, cwd: CWD })).toThrow(
      `Invalid setting 'allowUnverifiable' from state/settings.json: expected true, false, 1 or 0, got "sometimes"`,
    );
  });

  it('does not fall through to a lower layer', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('settings.json', { backoffBaseMs: 10 });

    expect(() => resolveSettings({ env: { LOADOUT_BACKOFF_MS: '-1' }, stateIO, cwd: CWD })).toThrow(SettingsError);
  });
});

describe('resolveSettings — SET-U4: settings.json shape', () => {
  it('rejects an array', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('settings.json', [1, 2]);

    expect(() => resolveSettings({ env: {}, stateIO, cwd: CWD })).toThrow(
      `Invalid setting 'settings' from state/settings.json: the file must hold a JSON object`,
    );
  });

  it('rejects unknown keys', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('settings.json', { retries: 2 });

    expect(() => resolveSettings({ env: {}, stateIO, cwd: CWD })).toThrow(/^Invalid setting 'retries' from state\/settings.json: unknown setting/);
  });
});

describe('writeSetting / unsetSetting — SET-U5', () => {
  it('stores parsed values and keeps the others', () => {
    const stateIO = new MemoryStateIO();
    writeSetting(stateIO, 'concurrency', '3', CWD);
    writeSetting(stateIO, 'installRoot', 'models', CWD);

    expect(stateIO.readJson('settings.json')).toEqual({ concurrency: 3, installRoot: join(CWD, 'models') });
  });

  it('rejects an invalid value without writing', () => {
    const stateIO = new MemoryStateIO();

    expect(() => writeSetting(stateIO, 'requestTimeoutMs', 'soon', CWD)).toThrow(SettingsError);
    expect(stateIO.readJson('settings.json')).toBeUndefined();
  });

  it('removes a stored value and reports whether there was one', () => {
    const stateIO = new MemoryStateIO();
    writeSetting(stateIO, 'concurrency', '3', CWD);
    writeSetting(stateIO, 'maxAttempts', '4', CWD);

    expect(unsetSetting(stateIO, 'concurrency')).toBe(true);
    expect(unsetSetting(stateIO, 'concurrency')).toBe(false);
    expect(stateIO.readJson('settings.json')).toEqual({ maxAttempts: 4 });
  });

  it('names the environment variable for each setting', () => {
    expect(envVarFor('requestTimeoutMs')).toBe('LOADOUT_TIMEOUT_MS');
  });
});
