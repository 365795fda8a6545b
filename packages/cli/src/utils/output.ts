/**
 * Output Utilities
 * Consistent output handling across commands with --json, --quiet, --verbose support
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { Command } from 'commander';
import { CommitwrightError } from '@commitwright/shared';

export interface OutputOptions {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * The part of a spinner commands use
 */
export interface Spinner {
  text: string;
  start(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  stop(): Spinner;
}

class SilentSpinner implements Spinner {
  text = '';
  start(): Spinner {
    return this;
  }
  succeed(): Spinner {
    return this;
  }
  fail(): Spinner {
    return this;
  }
  stop(): Spinner {
    return this;
  }
}

export class OutputManager {
  private options: OutputOptions;

  constructor(options: OutputOptions = {}) {
    this.options = options;
  }

  /**
   * Print success message
   */
  success(message: string, data?: unknown): void {
    if (this.options.quiet) return;

    if (this.options.json && data !== undefined) {
      this.json({ success: true, message, data });
    } else if (!this.options.json) {
      console.log(chalk.green('✓'), message);
      if (data !== undefined && this.options.verbose) {
        console.log(chalk.gray(JSON.stringify(data, null, 2)));
      }
    }
  }

  /**
   * Print error message; always shown
   */
  error(message: string, error?: unknown): void {
    const code = error instanceof CommitwrightError ? error.code : 'ERROR';

    if (this.options.json) {
      this.json({
        success: false,
        error: message,
        code,
        stack: this.options.verbose && error instanceof Error ? error.stack : undefined,
      });
    } else {
      console.error(chalk.red('✗'), message);
      if (error instanceof Error && this.options.verbose) {
        console.error(chalk.gray(error.stack ?? error.message));
      }
    }
  }

  /**
   * Print warning message
   */
  warn(message: string): void {
    if (this.options.quiet || this.options.json) return;
    console.log(chalk.yellow('⚠'), message);
  }

  /**
   * Print info message
   */
  info(message: string): void {
    if (this.options.quiet || this.options.json) return;
    console.log(chalk.cyan('ℹ'), message);
  }

  /**
   * Print debug message (only in verbose mode)
   */
  debug(message: string, data?: unknown): void {
    if (!this.options.verbose || this.options.json) return;

    console.log(chalk.gray('→'), chalk.gray(message));
    if (data !== undefined) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print plain text unless quiet or JSON
   */
  print(text: string): void {
    if (this.options.quiet || this.options.json) return;
    console.log(text);
  }

  /**
   * Spinner (inert in JSON and quiet mode)
   */
  spinner(text: string): Spinner {
    if (this.options.quiet || this.options.json) {
      return new SilentSpinner();
    }
    const spinner: Ora = ora({ text, stream: process.stderr });
    return spinner;
  }

  get isJson(): boolean {
    return !!this.options.json;
  }

  get isVerbose(): boolean {
    return !!this.options.verbose;
  }

  get isQuiet(): boolean {
    return !!this.options.quiet;
  }
}

/**
 * Add global output options to a command
 */
export function addGlobalOptions(command: Command): Command {
  return command
    .option('--json', 'Output as JSON')
    .option('-q, --quiet', 'Print only the commit message')
    .option('--verbose', 'Show verbose output including debug logs');
}

export function createOutput(options: OutputOptions): OutputManager {
  return new OutputManager({
    json: options.json,
    quiet: options.quiet,
    verbose: options.verbose,
  });
}
