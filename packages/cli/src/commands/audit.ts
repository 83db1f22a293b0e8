/**
 * loadout audit — Re-verify every installed artifact against its digest
 *
 * Exits 1 when any artifact is missing or fails verification.
 */

import { Command } from 'commander';
import { ProgressDisplay } from '../output/progress.js';
import { t } from '../output/theme.js';
import { buildRuntime, runAction } from '../runtime.js';

export function auditCommand(): Command {
  return new Command('audit')
    .description('Verify the digest of every artifact on disk')
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (options: { json?: boolean }, command: Command) => {
        const { manager } = await buildRuntime(command, new ProgressDisplay());
        const results = await manager.auditIntegrity();
        const failed = [...results.values()].filter((ok) => !ok).length;

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(Object.fromEntries(results), null, 2));
        } else {
          for (const [name, ok] of results) {
            // eslint-disable-next-line no-console
            console.log(ok ? `${t.green('✓')} ${name}` : `${t.red('✗')} ${name}  missing or corrupted`);
          }
          // eslint-disable-next-line no-console
          console.log(`\n${results.size - failed} of ${results.size} artifact(s) verified`);
        }

        if (failed > 0) process.exitCode = 1;
      }),
    );
}
