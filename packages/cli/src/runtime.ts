/**
 * Shared wiring for the CLI commands: global options, the acquisition
 * runtime, and the error boundary that turns structural errors into an
 * exit code.
 */

import type { Command } from 'commander';
import { ManifestError, SettingsError, UnknownArtifactError } from '@loadout/core';
import { createAcquisitionRuntime } from '@loadout/runtime-host';
import type { AcquisitionRuntime, SettingOverrides } from '@loadout/runtime-host';
import { ConsoleLogSink } from './output/console-sink.js';
import type { ProgressDisplay } from './output/progress.js';
import { t } from './output/theme.js';

/** Options declared on the root program, available to every subcommand. */
export interface GlobalOptions {
  readonly home?: string | undefined;
  readonly rememberHome?: boolean | undefined;
  readonly manifest?: string | undefined;
  readonly installRoot?: string | undefined;
  readonly verbose?: boolean | undefined;
}

export function globalsOf(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/** Setting overrides carried by the global flags. */
export function overridesOf(globals: GlobalOptions, extra: SettingOverrides = {}): SettingOverrides {
  return { manifestPath: globals.manifest, installRoot: globals.installRoot, ...extra };
}

export async function buildRuntime(
  command: Command,
  display: ProgressDisplay,
  extra: SettingOverrides = {},
): Promise<AcquisitionRuntime> {
  const globals = globalsOf(command);
  return createAcquisitionRuntime({
    home: globals.home,
    rememberHome: globals.rememberHome,
    overrides: overridesOf(globals, extra),
    sinks: [new ConsoleLogSink((line) => display.log(line), globals.verbose === true)],
  });
}

/**
 * Wrap a command action: configuration, manifest and unknown-name errors
 * are printed and set exit code 1. Anything else propagates.
 */
export function runAction<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (err: unknown) {
      if (err instanceof SettingsError || err instanceof ManifestError || err instanceof UnknownArtifactError) {
        // eslint-disable-next-line no-console
        console.error(t.red(`error: ${err.message}`));
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  };
}
