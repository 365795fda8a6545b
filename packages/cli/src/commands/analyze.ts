/**
 * commitwright analyze
 * Run the full workflow and report, without committing or touching the changelog
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createGitManager } from '@commitwright/core';
import { setLogLevel } from '@commitwright/shared';
import { addGlobalOptions, createOutput, type OutputOptions } from '../utils/output.js';
import { formatAnalysis, formatHistory, formatMessage, sectionHeader } from '../utils/formatting.js';
import {
  FileDiffSource,
  type WorkflowCommandOptions,
  buildConfig,
  resolveRepoRoot,
  runCommitWorkflow,
} from '../utils/workflow.js';

interface AnalyzeOptions extends WorkflowCommandOptions, OutputOptions {}

export function analyzeCommand(): Command {
  const cmd = new Command('analyze');

  cmd
    .description('Analyze staged changes and show the message, changelog entry and attempt history')
    .option('--diff-file <path>', 'Read the diff from a file instead of the index')
    .option('--provider <provider>', 'Model provider: ollama, anthropic or openrouter')
    .option('--model <model>', 'Model name')
    .option('--max-attempts <n>', 'Improvement attempts before accepting a message (0-5)');

  addGlobalOptions(cmd);

  cmd.action(async (options: AnalyzeOptions) => {
    const output = createOutput(options);
    if (options.verbose) {
      setLogLevel('debug');
    }

    try {
      const repoRoot = await resolveRepoRoot(options);
      const config = await buildConfig(repoRoot, { ...options, changelog: false });
      const diffSource = options.diffFile ? new FileDiffSource(options.diffFile) : createGitManager(repoRoot);

      const result = await runCommitWorkflow(config, diffSource, output);

      if (options.quiet) {
        console.log(result.message);
        return;
      }

      if (output.isJson) {
        output.json({
          message: result.message,
          commit: result.commit,
          analysis: result.analysis,
          history: result.state.messageHistory,
          changelogEntry: result.changelogEntry,
        });
        return;
      }

      output.print(formatAnalysis(result.analysis));
      output.print(sectionHeader('Attempts'));
      output.print(formatHistory(result.state.messageHistory));
      output.print('');
      output.print(formatMessage(result.message));
      output.print(sectionHeader('Changelog entry'));
      output.print(chalk.gray(result.changelogEntry));
    } catch (error: unknown) {
      output.error(error instanceof Error ? error.message : String(error), error);
      process.exit(1);
    }
  });

  return cmd;
}
