/**
 * Interactive prompts for CLI
 */

import * as readline from 'readline';
import chalk from 'chalk';

export type CommitAction = 'commit' | 'cancel';

export function getCommitPromptText(): string {
  return chalk.yellow(`Commit with this message? [${chalk.bold('y')}]es / [${chalk.bold('N')}]o: `);
}

/**
 * Parse the answer; only y or yes commits, empty input cancels
 */
export function parseCommitAction(input: string): CommitAction {
  const answer = input.trim().toLowerCase();
  return answer === 'y' || answer === 'yes' ? 'commit' : 'cancel';
}

/**
 * Ask a question on the terminal
 */
export async function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function confirmCommit(): Promise<CommitAction> {
  return parseCommitAction(await prompt(getCommitPromptText()));
}
