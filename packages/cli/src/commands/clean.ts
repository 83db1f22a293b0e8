/**
 * loadout clean — Delete staging files left by interrupted transfers
 */

import { Command } from 'commander';
import { ProgressDisplay } from '../output/progress.js';
import { buildRuntime, runAction } from '../runtime.js';

export function cleanCommand(): Command {
  return new Command('clean')
    .description('Remove partial downloads (*.part) so the next install starts over')
    .action(
      runAction(async (_options: Record<string, never>, command: Command) => {
        const { manager } = await buildRuntime(command, new ProgressDisplay());
        const removed = await manager.cleanStaging();

        if (removed.length === 0) {
          // eslint-disable-next-line no-console
          console.log('No staging files to remove.');
          return;
        }
        for (const path of removed) {
          // eslint-disable-next-line no-console
          console.log(`removed ${path}`);
        }
      }),
    );
}
