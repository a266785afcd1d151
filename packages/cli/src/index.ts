/**
 * @fluxlint/cli
 *
 * CLI entry point for fluxlint commands.
 */

import { Command } from 'commander';
import { lintCommand, refsCommand, showCommand, valuesCommand } from './commands/index.js';

const program = new Command();

program
  .name('fluxlint')
  .description('Validate, lint and inspect Flux HelmRelease documents')
  .version('0.1.0');

program.addCommand(lintCommand);
program.addCommand(showCommand);
program.addCommand(refsCommand);
program.addCommand(valuesCommand);

program.parse();
