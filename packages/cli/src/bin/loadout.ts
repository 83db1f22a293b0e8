#!/usr/bin/env node
/**
 * bin/loadout.ts — entry point for the `loadout` command.
 *
 *   loadout status
 *   loadout install [names...]
 *   loadout log --artifact speech-model --level warn
 */

import { createProgram } from '../commands/index.js'

await createProgram().parseAsync()
