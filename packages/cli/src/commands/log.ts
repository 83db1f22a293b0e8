/**
 * loadout log — Query the acquisition log
 *
 * Reads <home>/logs/acquisition.jsonl with dedupe-on-read. Needs only the
 * home directory; the manifest is not loaded.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { LogLevel } from '@loadout/core';
import {
  ACQUISITION_LOG_FILE,
  FileStateIO,
  filterLog,
  isLogLevel,
  readLog,
  resolveLoadoutHome,
} from '@loadout/runtime-host';
import { levelColor, t } from '../output/theme.js';
import { globalsOf, runAction } from '../runtime.js';

interface LogOptions {
  readonly artifact?: string | undefined;
  readonly level?: LogLevel | undefined;
  readonly limit: number;
  readonly json?: boolean | undefined;
}

function parseLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  return value;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isSafeInteger(limit) || limit < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return limit;
}

export function logCommand(): Command {
  return new Command('log')
    .description('Show recent acquisition log entries')
    .option('--artifact <name>', 'Only entries about this artifact')
    .option('--level <level>', 'Minimum level (debug|info|warn|error)', parseLevel)
    .option('--limit <n>', 'Maximum number of entries, newest kept', parseLimit, 50)
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (options: LogOptions, command: Command) => {
        const globals = globalsOf(command);
        const home = resolveLoadoutHome({ home: globals.home, persist: globals.rememberHome });
        const { records, stats } = readLog(new FileStateIO(home).readLogRaw(ACQUISITION_LOG_FILE));
        const selected = filterLog(records, options);

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(selected, null, 2));
          return;
        }

        if (selected.length === 0) {
          // eslint-disable-next-line no-console
          console.log('No log entries.');
        }
        for (const r of selected) {
          const about = r.artifact !== undefined ? `${r.artifact}: ` : '';
          // eslint-disable-next-line no-console
          console.log(`${t.muted(r.timestamp)}  ${levelColor(r.level)(r.level.padEnd(5))}  ${r.event}  ${about}${r.message}`);
        }

        if (stats.parseErrors > 0 || stats.partialTrailingLine) {
          // eslint-disable-next-line no-console
          console.error(
            t.amber(
              `warning: skipped ${stats.parseErrors} malformed line(s)` +
                (stats.partialTrailingLine ? ' and an incomplete final line' : ''),
            ),
          );
        }
      }),
    );
}
