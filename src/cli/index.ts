#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createAnalyzeCommand } from './commands/analyze.js';

const program = new Command();

program
  .name('breakwatch')
  .description('Detect breaking changes in Python code between two git revisions')
  .version('1.0.0');

program.addCommand(createAnalyzeCommand(), { isDefault: true });

process.on('SIGTERM', () => {
  process.exit(143);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 2;
});
