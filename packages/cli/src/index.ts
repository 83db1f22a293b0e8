/**
 * @loadout/cli
 *
 * Operator command line over @loadout/runtime-host. The `loadout` binary is
 * src/bin/loadout.ts; this module exposes the program factory and the
 * output helpers for embedding and tests.
 */

export { createProgram } from './commands/index.js';
export { summarize } from './commands/install.js';
export { ConsoleLogSink } from './output/console-sink.js';
export { ProgressDisplay, formatBytes, formatProgressLine } from './output/progress.js';
export type { ProgressStream } from './output/progress.js';
export type { GlobalOptions } from './runtime.js';
