/**
 * Commit Workflow
 * Staged diff to accepted commit message and changelog section
 *
 * ParseDiff -> AnalyzeFiles -> Summarize -> GenerateMessage -> CheckQuality
 * CheckQuality -> ImproveMessage -> CheckQuality while rejected and budget remains
 * CheckQuality -> EmitChangelog -> Terminal once accepted or the budget is spent
 *
 * Steps run strictly one after another. The instance is not reentrant:
 * every run() builds fresh session state.
 */

import {
  type AgentState,
  type ConventionalCommit,
  type DiffAnalysis,
  type Logger,
  type WorkflowStep,
  NoStagedChangesError,
  createLogger,
} from '@commitwright/shared';
import type { LanguageModel } from '../ai/model.js';
import { appendChangelogSection, formatChangelogSection } from '../changelog/emitter.js';
import { clampAttempts, MAX_ATTEMPTS_LIMIT } from '../config/index.js';
import { parseDiffSections } from '../diff/parser.js';
import { analyzeFiles } from './file-analyzer.js';
import { generateCommit, renderCommitMessage } from './message-generator.js';
import { improveMessage } from './message-improver.js';
import { checkQuality, decideAfterQuality } from './quality-gate.js';
import { summarizeChanges } from './summarizer.js';

/**
 * Where the staged diff comes from (GitManager, or a file for debugging)
 */
export interface DiffSource {
  getStagedDiff(): Promise<string>;
}

export type TransitionListener = (step: WorkflowStep, state: AgentState) => void;

export interface CommitWorkflowOptions {
  model: LanguageModel;
  diffSource: DiffSource;
  /** Changelog file; nothing is written without it */
  changelogPath?: string;
  /** Default true when a changelogPath is given */
  writeChangelog?: boolean;
  /** Improvement attempts before force-accepting, clamped to 0-5, default 5 */
  maxAttempts?: number;
  maxDiffChars?: number;
  logger?: Logger;
  onTransition?: TransitionListener;
}

export interface WorkflowResult {
  message: string;
  commit: ConventionalCommit;
  analysis: DiffAnalysis;
  changelogEntry: string;
  changelogWritten: boolean;
  state: AgentState;
}

export function createAgentState(): AgentState {
  return {
    events: [],
    attempts: 0,
    messageHistory: [],
  };
}

export class CommitWorkflow {
  private model: LanguageModel;
  private diffSource: DiffSource;
  private changelogPath?: string;
  private writeChangelog: boolean;
  private maxAttempts: number;
  private maxDiffChars?: number;
  private logger: Logger;
  private onTransition?: TransitionListener;

  constructor(options: CommitWorkflowOptions) {
    this.model = options.model;
    this.diffSource = options.diffSource;
    this.changelogPath = options.changelogPath;
    this.writeChangelog = options.writeChangelog ?? true;
    this.maxAttempts = clampAttempts(options.maxAttempts ?? MAX_ATTEMPTS_LIMIT);
    this.maxDiffChars = options.maxDiffChars;
    this.logger = options.logger ?? createLogger('workflow');
    this.onTransition = options.onTransition;
  }

  /**
   * Run one session
   *
   * @throws NoStagedChangesError before any model call when the diff is empty
   * @throws ParseError on malformed diff text
   * @throws ModelInvocationError on transport failure
   */
  async run(): Promise<WorkflowResult> {
    const state = createAgentState();

    this.enter(state, 'parse-diff');
    const diff = await this.diffSource.getStagedDiff();
    const sections = parseDiffSections(diff);
    if (sections.length === 0) {
      throw new NoStagedChangesError();
    }
    this.logger.info('Parsed staged diff', { files: sections.length });

    this.enter(state, 'analyze-files');
    const files = await analyzeFiles(this.model, sections, {
      maxDiffChars: this.maxDiffChars,
      logger: this.logger.child('file-analyzer'),
    });

    this.enter(state, 'summarize');
    const analysis = await summarizeChanges(this.model, files, this.logger.child('summarizer'));
    state.analysis = analysis;
    this.logger.info('Summarized changes', { changeType: analysis.changeType, breaking: analysis.breakingChange });

    this.enter(state, 'generate-message');
    const generated = await generateCommit(this.model, analysis);
    state.candidate = generated;

    const { message, commit } = await this.reviewLoop(state, analysis, generated);

    this.enter(state, 'emit-changelog');
    const changelogEntry = formatChangelogSection(message, analysis);
    state.changelogEntry = changelogEntry;

    let changelogWritten = false;
    if (this.writeChangelog && this.changelogPath) {
      await appendChangelogSection(this.changelogPath, changelogEntry);
      changelogWritten = true;
      this.logger.info('Appended changelog section', { path: this.changelogPath });
    }

    this.enter(state, 'terminal');

    return { message, commit, analysis, changelogEntry, changelogWritten, state };
  }

  /**
   * Check, improve, check again until accepted; one ledger entry per check and per rewrite
   */
  private async reviewLoop(
    state: AgentState,
    analysis: DiffAnalysis,
    initial: ConventionalCommit
  ): Promise<{ message: string; commit: ConventionalCommit }> {
    let commit = initial;
    let remainingBudget = this.maxAttempts;

    while (true) {
      this.enter(state, 'check-quality');
      const message = renderCommitMessage(commit);
      const verdict = await checkQuality(this.model, message, this.logger.child('quality-gate'));
      const decision = decideAfterQuality(
        verdict,
        Math.min(remainingBudget, MAX_ATTEMPTS_LIMIT - state.attempts)
      );

      if (decision.action === 'accept') {
        state.messageHistory.push({
          attempt: state.attempts,
          message,
          verdict,
          status: 'final',
          reason: decision.reason,
        });
        state.finalMessage = message;
        this.logger.info('Message accepted', { attempt: state.attempts, reason: decision.reason });
        return { message, commit };
      }

      state.messageHistory.push({ attempt: state.attempts, message, verdict, status: 'failed' });
      this.logger.debug('Message rejected', { attempt: state.attempts, issues: verdict.issues });

      this.enter(state, 'improve-message');
      const improved = await improveMessage(
        this.model,
        message,
        verdict,
        analysis,
        this.logger.child('message-improver')
      );
      remainingBudget--;
      state.attempts++;

      if (improved) {
        commit = improved;
      }
      state.candidate = commit;
      state.messageHistory.push({
        attempt: state.attempts,
        message: renderCommitMessage(commit),
        status: 'improved',
      });
    }
  }

  private enter(state: AgentState, step: WorkflowStep): void {
    state.events.push({ step, timestamp: Date.now() });
    this.logger.debug(`Entering ${step}`, { attempts: state.attempts });
    this.onTransition?.(step, state);
  }
}
