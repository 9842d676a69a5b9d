#!/usr/bin/env node
// formwork CLI

import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';
import { traverseCommand } from './commands/traverse.js';

const program = new Command();

program
  .name('formwork')
  .description('Coerce and validate documents against element definitions')
  .version('0.1.0');

program.addCommand(validateCommand);
program.addCommand(traverseCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
