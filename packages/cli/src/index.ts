#!/usr/bin/env node

/**
 * commitwright CLI
 * Main entry point for the commitwright command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { commitCommand } from './commands/commit.js';
import { analyzeCommand } from './commands/analyze.js';
import { debugCommand } from './commands/debug.js';

const program = new Command();

program
  .name('commitwright')
  .description('Conventional commit messages and changelog entries from staged changes')
  .version('0.1.0');

program.addCommand(commitCommand(), { isDefault: true });
program.addCommand(analyzeCommand());
program.addCommand(debugCommand());

program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.version' || err.code === 'commander.helpDisplayed') {
    process.exit(0);
  }
  console.error(chalk.red('Error:'), err.message);
  process.exit(1);
});

await program.parseAsync();
