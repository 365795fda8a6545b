/**
 * Shared setup for commands that run the commit workflow
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CommitWorkflow,
  type CommitwrightConfig,
  type GitManager,
  type DiffSource,
  type WorkflowResult,
  appendChangelogSection,
  clampAttempts,
  createLanguageModel,
  isLlmProvider,
  loadConfig,
  resolveChangelogPath,
  withLock,
  DEFAULT_MODELS,
} from '@commitwright/core';
import { ConfigError, type WorkflowStep, createLogger, ensureDir, findGitRoot } from '@commitwright/shared';
import type { OutputManager } from './output.js';

export interface WorkflowCommandOptions {
  diffFile?: string;
  changelog?: string | false;
  provider?: string;
  model?: string;
  maxAttempts?: string;
}

const STEP_LABELS: Record<WorkflowStep, string> = {
  'parse-diff': 'Reading staged changes...',
  'analyze-files': 'Analyzing changed files...',
  summarize: 'Summarizing changes...',
  'generate-message': 'Generating commit message...',
  'check-quality': 'Checking message quality...',
  'improve-message': 'Improving commit message...',
  'emit-changelog': 'Preparing changelog entry...',
  terminal: 'Done',
};

/**
 * Reads a saved diff instead of the index
 */
export class FileDiffSource implements DiffSource {
  constructor(private filePath: string) {}

  async getStagedDiff(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read diff file ${this.filePath}: ${message}`, error);
    }
  }
}

/**
 * Git root, or the working directory when reading from a diff file
 */
export async function resolveRepoRoot(options: WorkflowCommandOptions): Promise<string> {
  const root = await findGitRoot();
  if (root) {
    return root;
  }
  if (options.diffFile) {
    return process.cwd();
  }
  throw new ConfigError('Not in a git repository');
}

/**
 * Loaded config with command-line overrides on top
 */
export async function buildConfig(repoRoot: string, options: WorkflowCommandOptions): Promise<CommitwrightConfig> {
  const config = await loadConfig(repoRoot);
  const llm = { ...config.llm };
  const workflow = { ...config.workflow };
  const changelog = { ...config.changelog };

  if (options.provider !== undefined) {
    if (!isLlmProvider(options.provider)) {
      throw new ConfigError(`Unknown provider: ${options.provider} (expected ollama, anthropic or openrouter)`);
    }
    if (options.provider !== llm.provider) {
      llm.provider = options.provider;
      llm.model = DEFAULT_MODELS[options.provider];
      llm.apiKey = options.provider === 'anthropic'
        ? process.env.ANTHROPIC_API_KEY
        : options.provider === 'openrouter'
          ? process.env.OPENROUTER_API_KEY
          : undefined;
    }
  }
  if (options.model) {
    llm.model = options.model;
  }

  if (options.maxAttempts !== undefined) {
    const parsed = Number.parseInt(options.maxAttempts, 10);
    if (Number.isNaN(parsed)) {
      throw new ConfigError(`--max-attempts must be a number, got ${options.maxAttempts}`);
    }
    workflow.maxAttempts = clampAttempts(parsed);
  }

  if (options.changelog === false) {
    changelog.enabled = false;
  } else if (options.changelog) {
    changelog.path = options.changelog;
  }

  return { ...config, llm, workflow, changelog };
}

/**
 * Run the workflow with a spinner following its steps. The changelog is
 * never written here; callers append the entry once the commit exists.
 */
export async function runCommitWorkflow(
  config: CommitwrightConfig,
  diffSource: DiffSource,
  output: OutputManager
): Promise<WorkflowResult> {
  const model = createLanguageModel(config.llm);
  const spinner = output.spinner(STEP_LABELS['parse-diff']).start();

  const workflow = new CommitWorkflow({
    model,
    diffSource,
    writeChangelog: false,
    maxAttempts: config.workflow.maxAttempts,
    maxDiffChars: config.workflow.maxDiffChars,
    logger: createLogger('workflow'),
    onTransition: (step, state) => {
      spinner.text = step === 'check-quality' && state.attempts > 0
        ? `${STEP_LABELS[step]} (attempt ${state.attempts + 1})`
        : STEP_LABELS[step];
    },
  });

  try {
    const result = await workflow.run();
    spinner.succeed(`Message ready (${model.id})`);
    return result;
  } catch (error) {
    spinner.fail('Workflow failed');
    throw error;
  }
}

/**
 * Commit the staged changes with a message the user wrote, without the workflow
 *
 * @returns the sha of the new commit
 */
export async function commitWithMessage(
  git: Pick<GitManager, 'getStagedDiff' | 'createCommit'>,
  message: string
): Promise<string> {
  const text = message.trim();
  if (!text) {
    throw new ConfigError('--message must not be empty');
  }
  await git.getStagedDiff();
  return git.createCommit(text);
}

/**
 * Append the entry while holding the changelog lock
 *
 * @returns the changelog path
 */
export async function writeChangelogEntry(repoRoot: string, config: CommitwrightConfig, entry: string): Promise<string> {
  const changelogPath = resolveChangelogPath(repoRoot, config);
  await ensureDir(path.dirname(changelogPath));
  await withLock(changelogPath, () => appendChangelogSection(changelogPath, entry));
  return changelogPath;
}
