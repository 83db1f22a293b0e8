/**
 * loadout list — Show the artifacts the manifest declares
 */

import { Command } from 'commander';
import { ProgressDisplay, formatBytes } from '../output/progress.js';
import { t } from '../output/theme.js';
import { buildRuntime, runAction } from '../runtime.js';

export function listCommand(): Command {
  return new Command('list')
    .description('List the artifacts declared in the manifest')
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (options: { json?: boolean }, command: Command) => {
        const { manager, settings } = await buildRuntime(command, new ProgressDisplay());
        const descriptors = manager.listRequired();

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(
            JSON.stringify(
              descriptors.map((d) => ({ ...d, path: manager.pathOf(d.name) })),
              null,
              2,
            ),
          );
          return;
        }

        if (descriptors.length === 0) {
          // eslint-disable-next-line no-console
          console.log(`No artifacts declared in ${settings.values.manifestPath}`);
          return;
        }

        for (const d of descriptors) {
          const size = d.expectedSizeBytes > 0 ? formatBytes(d.expectedSizeBytes) : 'size unknown';
          const digest = d.digest !== undefined ? d.digestAlgorithm : 'no digest';
          // eslint-disable-next-line no-console
          console.log(`${t.white(d.name)}  ${t.muted(d.kind)}  ${size}  ${digest}`);
          // eslint-disable-next-line no-console
          console.log(`  ${t.dim(manager.pathOf(d.name))}`);
        }
      }),
    );
}
