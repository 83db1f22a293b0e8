/**
 * Loadout Runtime Host — Home Directory Tests
 *
 *   HOME-U1: --home wins over LOADOUT_HOME and the OS config file
 *   HOME-U2: LOADOUT_HOME wins over the OS config file
 *   HOME-U3: the OS config file wins over the default
 *   HOME-U4: the default is ~/.loadout, created on demand
 *   HOME-U5: persist remembers only an explicit home
 *   HOME-U6: the OS config path follows the platform
 *
 * Isolation: a temp directory stands in for the user's home.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { SettingsError } from '@loadout/core';
import { getOsConfigPath, readHomeFromConfig, resolveLoadoutHome } from '../src/config/home.js';

function userHome(): string {
  return mkdtempSync(join(tmpdir(), 'loadout-user-'));
}

function remember(home: string, user: string): void {
  const configPath = getOsConfigPath({ userHome: user, platform: 'linux' });
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }));
}

describe('resolveLoadoutHome', () => {
  it('HOME-U1: prefers the explicit home', () => {
    const user = userHome();
    remember(join(user, 'remembered'), user);

    const home = resolveLoadoutHome({
      home: join(user, 'explicit'),
      env: { LOADOUT_HOME: join(user, 'from-env') },
      userHome: user,
      platform: 'linux',
    });

    expect(home).toBe(join(user, 'explicit'));
    expect(existsSync(home)).toBe(true);
  });

  it('HOME-U2: uses LOADOUT_HOME when no flag is given', () => {
    const user = userHome();
    remember(join(user, 'remembered'), user);

    expect(resolveLoadoutHome({ env: { LOADOUT_HOME: join(user, 'from-env') }, userHome: user, platform: 'linux' })).toBe(
      join(user, 'from-env'),
    );
  });

  it('HOME-U3: uses the remembered home', () => {
    const user = userHome();
    remember(join(user, 'remembered'), user);

    expect(resolveLoadoutHome({ env: {}, userHome: user, platform: 'linux' })).toBe(join(user, 'remembered'));
  });

  it('HOME-U4: defaults to ~/.loadout', () => {
    const user = userHome();

    const home = resolveLoadoutHome({ env: {}, userHome: user, platform: 'linux' });

    expect(home).toBe(join(user, '.loadout'));
    expect(existsSync(home)).toBe(true);
  });

  it('HOME-U5: persists an explicit home only', () => {
    const user = userHome();
    const environment = { env: {}, userHome: user, platform: 'linux' as const };

    resolveLoadoutHome({ ...environment, persist: true });
    expect(readHomeFromConfig(environment)).toBeNull();

    resolveLoadoutHome({ ...environment, home: join(user, 'chosen'), persist: true });
    expect(readHomeFromConfig(environment)).toBe(join(user, 'chosen'));
  });

  it('rejects a config file that is not JSON', () => {
    const user = userHome();
    const configPath = getOsConfigPath({ userHome: user, platform: 'linux' });
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, '{ home');

    expect(() => readHomeFromConfig({ userHome: user, platform: 'linux' })).toThrow(SettingsError);
  });
});

describe('getOsConfigPath — HOME-U6', () => {
  it('follows platform conventions', () => {
    expect(getOsConfigPath({ userHome: '/home/dev', platform: 'linux' })).toBe('/home/dev/.config/loadout/config.json');
    expect(getOsConfigPath({ userHome: '/Users/dev', platform: 'darwin' })).toBe(
      '/Users/dev/Library/Preferences/loadout/config.json',
    );
    expect(getOsConfigPath({ userHome: '/home/dev', platform: 'win32', env: { APPDATA: '/appdata' } })).toBe(
      join('/appdata', 'loadout', 'config.json'),
    );
  });
});
