#!/usr/bin/env node

/**
 * taskpilot CLI entry point.
 * Thin wrapper: all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerExecCommand, registerRunCommand, registerScriptsCommand } from './run.js';
import * as log from '../utils/logger.js';

const program = new Command();

program
  .name('taskpilot')
  .description(
    'Browser task automation. Explores a task with an LLM agent once, compiles repeatable tasks into scripts, and replays them with live fallback.',
  )
  .version('0.1.0')
  .option('-q, --quiet', 'Only print warnings and errors')
  .hook('preAction', () => {
    if (program.opts<{ quiet?: true }>().quiet) log.setLevel('quiet');
  });

registerExecCommand(program);
registerRunCommand(program);
registerScriptsCommand(program);

await program.parseAsync();
