/**
 * loadout config — Inspect and persist settings
 *
 * Subcommands:
 *   loadout config show             — effective value and source of every setting
 *   loadout config set <name> <v>   — store a value in <home>/state/settings.json
 *   loadout config unset <name>     — remove a stored value
 *
 * Precedence when resolving: command-line flag → environment variable →
 * settings.json → default. `set` only writes the file layer, so an
 * environment variable still wins over it.
 */

import { Command } from 'commander';
import { SettingsError } from '@loadout/core';
import {
  FileStateIO,
  SETTING_NAMES,
  envVarFor,
  isSettingName,
  resolveLoadoutHome,
  resolveSettings,
  unsetSetting,
  writeSetting,
} from '@loadout/runtime-host';
import type { SettingName } from '@loadout/runtime-host';
import { t } from '../output/theme.js';
import { globalsOf, overridesOf, runAction } from '../runtime.js';
import type { GlobalOptions } from '../runtime.js';

function stateFor(globals: GlobalOptions): { home: string; stateIO: FileStateIO } {
  const home = resolveLoadoutHome({ home: globals.home, persist: globals.rememberHome });
  return { home, stateIO: new FileStateIO(home) };
}

function settingName(name: string): SettingName {
  if (!isSettingName(name)) {
    throw new SettingsError(name, 'command line', `unknown setting; expected one of ${SETTING_NAMES.join(', ')}`);
  }
  return name;
}

// ---------------------------------------------------------------------------
// loadout config show
// ---------------------------------------------------------------------------

function showConfigCommand(): Command {
  return new Command('show')
    .description('Show every setting with the layer it came from')
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (options: { json?: boolean }, command: Command) => {
        const globals = globalsOf(command);
        const { home, stateIO } = stateFor(globals);
        const { values, sources } = resolveSettings({ overrides: overridesOf(globals), stateIO });

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({ home, values, sources }, null, 2));
          return;
        }

        // eslint-disable-next-line no-console
        console.log(`home  ${home}`);
        for (const name of SETTING_NAMES) {
          const source = sources[name] === 'env' ? `env ${envVarFor(name)}` : sources[name];
          // eslint-disable-next-line no-console
          console.log(`${name}  ${String(values[name])}  ${t.muted(`(${source})`)}`);
        }
      }),
    );
}

// ---------------------------------------------------------------------------
// loadout config set <name> <value>
// ---------------------------------------------------------------------------

function setConfigCommand(): Command {
  return new Command('set')
    .description('Store a setting in the home directory')
    .argument('<name>', `One of ${SETTING_NAMES.join(', ')}`)
    .argument('<value>', 'New value')
    .action(
      runAction(async (name: string, value: string, _options: Record<string, never>, command: Command) => {
        const setting = settingName(name);
        const { stateIO } = stateFor(globalsOf(command));
        writeSetting(stateIO, setting, value);
        const stored = resolveSettings({ env: {}, stateIO }).values[setting];
        // eslint-disable-next-line no-console
        console.log(`${setting} = ${String(stored)}`);
      }),
    );
}

// ---------------------------------------------------------------------------
// loadout config unset <name>
// ---------------------------------------------------------------------------

function unsetConfigCommand(): Command {
  return new Command('unset')
    .description('Remove a stored setting so the default applies again')
    .argument('<name>', 'Setting name')
    .action(
      runAction(async (name: string, _options: Record<string, never>, command: Command) => {
        const setting = settingName(name);
        const { stateIO } = stateFor(globalsOf(command));
        // eslint-disable-next-line no-console
        console.log(unsetSetting(stateIO, setting) ? `${setting} removed` : `${setting} was not set`);
      }),
    );
}

export function configCommand(): Command {
  return new Command('config')
    .description('Inspect and persist settings')
    .addCommand(showConfigCommand())
    .addCommand(setConfigCommand())
    .addCommand(unsetConfigCommand());
}
