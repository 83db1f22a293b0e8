/**
 * loadout install — Fetch and verify artifacts
 *
 * Usage:
 *   loadout install                  every artifact not yet installed
 *   loadout install <name> [...]     the named artifacts, in order
 *   loadout install --force [name]   fetch again even when the file verifies
 *
 * Ctrl-C cancels: transfers stop at the next chunk, staging files are kept,
 * and the command exits 130. Any failed artifact makes the exit code 1.
 */

import { Command } from 'commander';
import { UnknownArtifactError, describeFailure } from '@loadout/core';
import type { AcquireOutcome, ArtifactAcquisitionManager } from '@loadout/core';
import { ProgressDisplay } from '../output/progress.js';
import { t } from '../output/theme.js';
import { buildRuntime, runAction } from '../runtime.js';

interface InstallOptions {
  readonly force?: boolean | undefined;
  readonly concurrency?: string | undefined;
}

export function installCommand(): Command {
  return new Command('install')
    .description('Fetch and verify artifacts; all missing ones when no name is given')
    .argument('[names...]', 'Artifact names from the manifest')
    .option('--force', 'Fetch again even when the installed file verifies')
    .option('-j, --concurrency <n>', 'Parallel transfers when installing everything')
    .action(
      runAction(async (names: string[], options: InstallOptions, command: Command) => {
        const display = new ProgressDisplay();
        const { manager, catalog } = await buildRuntime(command, display, { concurrency: options.concurrency });

        for (const name of names) {
          if (!catalog.has(name)) throw new UnknownArtifactError(name, catalog.names());
        }

        const controller = new AbortController();
        const onInterrupt = (): void => {
          display.log(t.amber('Cancelling; partial downloads are kept and resume on the next install'));
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);

        let outcomes: ReadonlyArray<AcquireOutcome>;
        try {
          if (names.length === 0 && options.force !== true) {
            const tally = await manager.acquireAll({
              signal: controller.signal,
              onProgress: (name, bytes, total) => display.update(name, bytes, total),
            });
            outcomes = tally.outcomes;
          } else {
            const targets = names.length > 0 ? names : catalog.names();
            outcomes = await installEach(manager, targets, options.force === true, controller.signal, display);
          }
        } finally {
          process.removeListener('SIGINT', onInterrupt);
          display.finish();
        }

        if (outcomes.length === 0) {
          // eslint-disable-next-line no-console
          console.log(catalog.size === 0 ? 'No artifacts declared.' : 'All artifacts are already installed.');
          return;
        }

        for (const outcome of outcomes) {
          // eslint-disable-next-line no-console
          console.log(summarize(outcome));
        }

        if (outcomes.some((o) => o.status === 'cancelled')) {
          process.exitCode = 130;
        } else if (outcomes.some((o) => o.status === 'failed')) {
          process.exitCode = 1;
        }
      }),
    );
}

async function installEach(
  manager: ArtifactAcquisitionManager,
  names: ReadonlyArray<string>,
  force: boolean,
  signal: AbortSignal,
  display: ProgressDisplay,
): Promise<ReadonlyArray<AcquireOutcome>> {
  const outcomes: AcquireOutcome[] = [];
  for (const name of names) {
    if (signal.aborted) break;
    outcomes.push(
      await manager.acquire(name, {
        force,
        signal,
        onProgress: (bytes, total) => display.update(name, bytes, total),
      }),
    );
  }
  return outcomes;
}

/** One result line per artifact. */
export function summarize(outcome: AcquireOutcome): string {
  switch (outcome.status) {
    case 'installed':
      return outcome.fetched
        ? `${t.green('✓')} ${outcome.name}  installed (${outcome.attempts} attempt(s))`
        : `${t.green('✓')} ${outcome.name}  already installed`;
    case 'cancelled':
      return `${t.amber('-')} ${outcome.name}  cancelled`;
    case 'failed': {
      const reason = outcome.failure !== undefined ? `: ${describeFailure(outcome.failure)}` : '';
      return `${t.red('✗')} ${outcome.name}  failed after ${outcome.attempts} attempt(s)${reason}`;
    }
  }
}
