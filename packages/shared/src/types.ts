/**
 * Shared types for commitwright
 */

// ========== Diff Types ==========

/**
 * How a file section of a diff is classified
 */
export type FileChangeType =
  | 'NEW'
  | 'DELETED'
  | 'RENAMED'
  | 'MODE_CHANGED'
  | 'MODIFIED'
  | 'BINARY'
  | 'SUBMODULE'
  | 'CONFLICT';

export interface DiffHunk {
  oldStart: number;
  oldLength: number;
  newStart: number;
  newLength: number;
  addedLines: number;
  removedLines: number;
  unchangedLines: number;
  /** Every counted body line: added + removed + unchanged */
  modifiedLines: number;
}

export interface FileChange {
  path: string;
  changeType: FileChangeType;
  /** Only set for RENAMED */
  oldPath?: string;
  oldMode?: string;
  newMode?: string;
  addedLines: number;
  removedLines: number;
  hunks: DiffHunk[];
  /** Empty until analyzed */
  purpose: string;
}

// ========== Commit Types ==========

export const COMMIT_TYPES = ['feat', 'fix', 'docs', 'refactor', 'test', 'chore', 'style', 'perf'] as const;

export type CommitType = typeof COMMIT_TYPES[number];

export interface DiffAnalysis {
  summary: string;
  changeType: CommitType;
  files: FileChange[];
  breakingChange: boolean;
}

export interface ConventionalCommit {
  type: CommitType;
  scope?: string;
  description: string;
  breaking: boolean;
  body?: string;
  footer?: string;
}

export interface QualityVerdict {
  isValid: boolean;
  issues: string[];
}

// ========== Workflow Types ==========

export type WorkflowStep =
  | 'parse-diff'
  | 'analyze-files'
  | 'summarize'
  | 'generate-message'
  | 'check-quality'
  | 'improve-message'
  | 'emit-changelog'
  | 'terminal';

export type HistoryStatus = 'failed' | 'improved' | 'final';

export type AcceptReason = 'valid' | 'max-attempts-reached';

export interface MessageHistoryEntry {
  attempt: number;
  message: string;
  verdict?: QualityVerdict;
  status: HistoryStatus;
  /** Set on the final entry */
  reason?: AcceptReason;
}

export interface WorkflowEvent {
  step: WorkflowStep;
  timestamp: number;
}

/**
 * Session state threaded through every workflow step
 */
export interface AgentState {
  events: WorkflowEvent[];
  attempts: number;
  analysis?: DiffAnalysis;
  candidate?: ConventionalCommit;
  finalMessage?: string;
  messageHistory: MessageHistoryEntry[];
  changelogEntry?: string;
}

// ========== Error Types ==========

export class CommitwrightError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'CommitwrightError';
  }
}

export class GitError extends CommitwrightError {
  constructor(message: string, details?: unknown) {
    super(message, 'GIT_ERROR', details);
    this.name = 'GitError';
  }
}

export class NoStagedChangesError extends CommitwrightError {
  constructor(message: string = 'No staged changes to analyze. Stage your changes with `git add` first.') {
    super(message, 'NO_STAGED_CHANGES');
    this.name = 'NoStagedChangesError';
  }
}

export class ParseError extends CommitwrightError {
  constructor(message: string, details?: unknown) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class ModelInvocationError extends CommitwrightError {
  constructor(message: string, details?: unknown) {
    super(message, 'MODEL_ERROR', details);
    this.name = 'ModelInvocationError';
  }
}

export class SchemaValidationError extends CommitwrightError {
  constructor(
    message: string,
    public payload: unknown,
    details?: unknown
  ) {
    super(message, 'SCHEMA_ERROR', details);
    this.name = 'SchemaValidationError';
  }
}

export class ConfigError extends CommitwrightError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class LockError extends CommitwrightError {
  constructor(message: string, details?: unknown) {
    super(message, 'LOCK_ERROR', details);
    this.name = 'LockError';
  }
}
