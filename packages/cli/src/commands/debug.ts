/**
 * commitwright debug
 * Inspect the parsed diff without calling a model
 */

import { Command } from 'commander';
import { countLines, createGitManager, parseDiff } from '@commitwright/core';
import { addGlobalOptions, createOutput, type OutputOptions } from '../utils/output.js';
import { formatFileChange, sectionHeader } from '../utils/formatting.js';
import { FileDiffSource, resolveRepoRoot } from '../utils/workflow.js';

interface DebugOptions extends OutputOptions {
  diff?: boolean;
  diffFile?: string;
}

export function debugCommand(): Command {
  const cmd = new Command('debug');

  cmd
    .description('Show how the staged diff is parsed')
    .option('--diff', 'Print the parsed file changes')
    .option('--diff-file <path>', 'Read the diff from a file instead of the index');

  addGlobalOptions(cmd);

  cmd.action(async (options: DebugOptions) => {
    const output = createOutput(options);

    if (!options.diff) {
      output.info('Nothing to inspect. Pass --diff to print the parsed changes.');
      return;
    }

    try {
      const repoRoot = await resolveRepoRoot(options);
      const source = options.diffFile ? new FileDiffSource(options.diffFile) : createGitManager(repoRoot);
      const files = parseDiff(await source.getStagedDiff());

      if (output.isJson) {
        output.json(files);
        return;
      }

      const totals = countLines(files);
      output.print(sectionHeader(`Staged diff: ${files.length} file(s), +${totals.added} -${totals.removed}`));
      for (const file of files) {
        output.print(formatFileChange(file));
        output.debug(`${file.hunks.length} hunk(s)`, file.hunks);
      }
    } catch (error: unknown) {
      output.error(error instanceof Error ? error.message : String(error), error);
      process.exit(1);
    }
  });

  return cmd;
}
