/**
 * Visual formatting utilities for CLI output
 */

import chalk from 'chalk';
import type { DiffAnalysis, FileChange, FileChangeType, MessageHistoryEntry } from '@commitwright/shared';

function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Create a horizontal divider line
 */
export function divider(style: 'light' | 'heavy' = 'light', width?: number): string {
  const w = width || Math.min(getTerminalWidth(), 80);
  const chars = {
    light: '─',
    heavy: '━',
  };
  return chalk.gray(chars[style].repeat(w));
}

/**
 * Create a labeled divider
 * Example: ──── Message ────
 */
export function labeledDivider(label: string, width?: number): string {
  const w = width || Math.min(getTerminalWidth(), 80);
  const labelWithPadding = ` ${label} `;
  const remainingWidth = Math.max(0, w - labelWithPadding.length);
  const leftWidth = Math.floor(remainingWidth / 2);
  const rightWidth = remainingWidth - leftWidth;

  return chalk.gray('─'.repeat(leftWidth)) + chalk.bold(labelWithPadding) + chalk.gray('─'.repeat(rightWidth));
}

/**
 * Create a section header with visual emphasis
 */
export function sectionHeader(title: string): string {
  return `\n${chalk.bold.cyan(title)}\n${divider('light')}`;
}

const CHANGE_TYPE_COLORS: Record<FileChangeType, (text: string) => string> = {
  NEW: chalk.green,
  DELETED: chalk.red,
  RENAMED: chalk.blue,
  MODE_CHANGED: chalk.gray,
  MODIFIED: chalk.yellow,
  BINARY: chalk.magenta,
  SUBMODULE: chalk.cyan,
  CONFLICT: chalk.red.bold,
};

/**
 * One line per file: type, path (with rename source), line counts
 */
export function formatFileChange(file: FileChange): string {
  const type = CHANGE_TYPE_COLORS[file.changeType](file.changeType.padEnd(12));
  const target = file.oldPath ? `${file.oldPath} → ${file.path}` : file.path;
  const counts = `${chalk.green(`+${file.addedLines}`)} ${chalk.red(`-${file.removedLines}`)}`;
  return `${type} ${target} ${counts}`;
}

export function formatAnalysis(analysis: DiffAnalysis): string {
  const lines = [
    sectionHeader('Analysis'),
    `${chalk.bold('Type:')} ${analysis.changeType}`,
    `${chalk.bold('Summary:')} ${analysis.summary}`,
  ];

  if (analysis.breakingChange) {
    lines.push(chalk.red.bold('⚠ BREAKING CHANGE'));
  }

  lines.push('', chalk.bold('Files:'));
  for (const file of analysis.files) {
    lines.push(`  ${formatFileChange(file)}`);
    if (file.purpose) {
      lines.push(chalk.gray(`    ${file.purpose}`));
    }
  }

  return lines.join('\n');
}

const STATUS_LABELS: Record<MessageHistoryEntry['status'], string> = {
  failed: chalk.red('failed'),
  improved: chalk.yellow('improved'),
  final: chalk.green('final'),
};

/**
 * Attempt ledger, one line per entry (header line of each message only)
 */
export function formatHistory(history: MessageHistoryEntry[]): string {
  return history
    .map(entry => {
      const header = entry.message.split('\n')[0];
      const reason = entry.reason ? chalk.gray(` (${entry.reason})`) : '';
      return `  #${entry.attempt} ${STATUS_LABELS[entry.status]}${reason}  ${header}`;
    })
    .join('\n');
}

/**
 * The message framed by dividers
 */
export function formatMessage(message: string): string {
  return [labeledDivider('Commit Message', 60), message, divider('light', 60)].join('\n');
}
