/**
 * commitwright commit
 * Generate a message for the staged changes, confirm, commit, and append the changelog entry
 */

import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { createGitManager } from '@commitwright/core';
import { setLogLevel } from '@commitwright/shared';
import { addGlobalOptions, createOutput, type OutputOptions } from '../utils/output.js';
import { formatAnalysis, formatHistory, formatMessage } from '../utils/formatting.js';
import { confirmCommit } from '../utils/prompts.js';
import {
  FileDiffSource,
  type WorkflowCommandOptions,
  buildConfig,
  commitWithMessage,
  resolveRepoRoot,
  runCommitWorkflow,
  writeChangelogEntry,
} from '../utils/workflow.js';

interface CommitOptions extends WorkflowCommandOptions, OutputOptions {
  dryRun?: boolean;
  yes?: boolean;
  message?: string;
}

export function commitCommand(): Command {
  const cmd = new Command('commit');

  cmd
    .description('Generate a conventional commit message for the staged changes and commit them')
    .option('--dry-run', 'Show the generated message without committing or writing the changelog')
    .option('-y, --yes', 'Commit without asking for confirmation')
    .option('-m, --message <text>', 'Commit with this message; skips generation and the changelog')
    .option('--diff-file <path>', 'Read the diff from a file instead of the index (implies --dry-run)')
    .option('--changelog <path>', 'Changelog file to append to')
    .option('--no-changelog', 'Do not write the changelog')
    .option('--provider <provider>', 'Model provider: ollama, anthropic or openrouter')
    .option('--model <model>', 'Model name')
    .option('--max-attempts <n>', 'Improvement attempts before accepting a message (0-5)');

  addGlobalOptions(cmd);

  cmd.action(async (options: CommitOptions) => {
    const output = createOutput(options);
    if (options.verbose) {
      setLogLevel('debug');
    }

    try {
      if (options.message !== undefined) {
        const sha = await commitWithMessage(createGitManager(await resolveRepoRoot({})), options.message);
        if (output.isJson) {
          output.json({ message: options.message.trim(), sha });
        } else if (!options.quiet) {
          output.success(`Committed ${chalk.cyan(sha.slice(0, 7))}`);
        }
        return;
      }

      const repoRoot = await resolveRepoRoot(options);
      const config = await buildConfig(repoRoot, options);
      const git = createGitManager(repoRoot);
      const diffSource = options.diffFile ? new FileDiffSource(options.diffFile) : git;
      const dryRun = options.dryRun || options.diffFile !== undefined;

      const result = await runCommitWorkflow(config, diffSource, output);

      if (options.quiet) {
        console.log(result.message);
      } else if (output.isJson) {
        output.json({
          message: result.message,
          commit: result.commit,
          analysis: result.analysis,
          history: result.state.messageHistory,
        });
      } else {
        output.print(formatAnalysis(result.analysis));
        if (output.isVerbose) {
          output.print(`\n${chalk.bold('Attempts:')}\n${formatHistory(result.state.messageHistory)}`);
        }
        output.print('');
        output.print(formatMessage(result.message));
      }

      if (dryRun) {
        output.info('Dry run: no commit created, changelog untouched');
        return;
      }

      if (!options.yes) {
        if (options.quiet || output.isJson) {
          return;
        }
        if ((await confirmCommit()) === 'cancel') {
          output.warn('Commit cancelled.');
          return;
        }
      }

      const sha = await git.createCommit(result.message);
      output.success(`Committed ${chalk.cyan(sha.slice(0, 7))}`);

      if (config.changelog.enabled) {
        const changelogPath = await writeChangelogEntry(repoRoot, config, result.changelogEntry);
        output.success(`Changelog updated: ${path.relative(repoRoot, changelogPath)}`);
      }
    } catch (error: unknown) {
      output.error(error instanceof Error ? error.message : String(error), error);
      process.exit(1);
    }
  });

  return cmd;
}
