#!/usr/bin/env node
/**
 * @netmerge/cli
 *
 * CLI entry point for netmerge commands.
 */

import { Command } from 'commander';
import { mergeCommand, pathsCommand, checkCommand } from './commands/index.js';

const program = new Command();

program
  .name('netmerge')
  .description('Merge network description documents and keep their references intact')
  .version('0.1.0');

program.addCommand(mergeCommand);
program.addCommand(pathsCommand);
program.addCommand(checkCommand);

await program.parseAsync();
