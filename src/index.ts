#!/usr/bin/env node

import { Command } from 'commander';
import { lintCommand } from './commands/lint.js';
import { doctorCommand } from './commands/doctor.js';
import { WORKTRACK_VERSION } from './version.js';

const program = new Command();

program
  .name('worktrack')
  .description('Schema-driven validation and repair for markdown work items')
  .version(WORKTRACK_VERSION)
  .option('-w, --workspace <path>', 'Path to the workspace directory');

program.addCommand(lintCommand);
program.addCommand(doctorCommand);

await program.parseAsync();
