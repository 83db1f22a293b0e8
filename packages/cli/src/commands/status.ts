/**
 * loadout status — Show the on-disk state of every artifact
 *
 * State is read from the install root on every call. A staging file left by
 * an interrupted transfer is shown with its size; the next install resumes
 * from it.
 */

import { Command } from 'commander';
import { ArtifactState } from '@loadout/core';
import { ProgressDisplay, formatBytes } from '../output/progress.js';
import { stateColor, t } from '../output/theme.js';
import { buildRuntime, runAction } from '../runtime.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Show whether each artifact is installed, absent or corrupted')
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (options: { json?: boolean }, command: Command) => {
        const { manager } = await buildRuntime(command, new ProgressDisplay());
        const reports = await manager.report();

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(reports, null, 2));
          return;
        }

        if (reports.length === 0) {
          // eslint-disable-next-line no-console
          console.log('No artifacts declared.');
          return;
        }

        for (const r of reports) {
          const staged = r.stagedBytes > 0 ? t.muted(`  (${formatBytes(r.stagedBytes)} staged)`) : '';
          // eslint-disable-next-line no-console
          console.log(`${r.name}  ${stateColor(r.state)(r.state)}${staged}`);
          // eslint-disable-next-line no-console
          console.log(`  ${t.dim(r.path)}`);
        }

        const installed = reports.filter((r) => r.state === ArtifactState.Installed).length;
        // eslint-disable-next-line no-console
        console.log(`\n${installed} of ${reports.length} artifact(s) installed`);
      }),
    );
}
