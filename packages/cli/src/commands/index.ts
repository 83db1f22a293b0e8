/**
 * commands/index.ts — Commander program factory.
 *
 * Imported by:
 *   src/bin/loadout.ts   (parses process.argv)
 *   src/index.ts         (library export, used by tests)
 *
 * Global options apply to every subcommand and override the environment
 * and settings.json for the invocation.
 */

import { Command } from 'commander'
import { auditCommand } from './audit.js'
import { cleanCommand } from './clean.js'
import { configCommand } from './config.js'
import { installCommand } from './install.js'
import { listCommand } from './list.js'
import { logCommand } from './log.js'
import { statusCommand } from './status.js'

export function createProgram(): Command {
  return new Command('loadout')
    .description(
      'Loadout — provisions the model artifacts a node-graph execution host needs.\n' +
      'Downloads resume after interruption and every file is checked against its digest.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Loadout home directory (default: $LOADOUT_HOME or ~/.loadout)')
    .option('--remember-home', 'Persist --home in the OS config file')
    .option('--manifest <path>', 'Artifact manifest (YAML or JSON)')
    .option('--install-root <dir>', 'Directory artifacts are installed under')
    .option('-v, --verbose', 'Show info and debug log entries')
    .addCommand(listCommand())
    .addCommand(statusCommand())
    .addCommand(installCommand())
    .addCommand(auditCommand())
    .addCommand(cleanCommand())
    .addCommand(logCommand())
    .addCommand(configCommand())
}
