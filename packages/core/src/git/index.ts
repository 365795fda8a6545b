/**
 * Git layer
 * Staged diff retrieval and commit creation
 */

import simpleGit, { type SimpleGit } from 'simple-git';
import { GitError, NoStagedChangesError } from '@commitwright/shared';
import type { DiffSource } from '../workflow/commit-workflow.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GitManager implements DiffSource {
  private git: SimpleGit;

  constructor(repoRoot: string) {
    this.git = simpleGit(repoRoot);
  }

  /**
   * Get the staged diff
   *
   * @throws NoStagedChangesError when nothing is staged
   */
  async getStagedDiff(): Promise<string> {
    let diff: string;
    try {
      diff = await this.git.diff(['--cached', '--no-color', '--no-ext-diff']);
    } catch (error: unknown) {
      throw new GitError(`Failed to get staged diff: ${errorMessage(error)}`, error);
    }

    if (!diff.trim()) {
      throw new NoStagedChangesError();
    }
    return diff;
  }

  /**
   * Commit the staged changes
   *
   * @returns the sha of the new commit
   */
  async createCommit(message: string): Promise<string> {
    try {
      await this.git.commit(message);
      const sha = await this.git.revparse(['HEAD']);
      return sha.trim();
    } catch (error: unknown) {
      throw new GitError(`Failed to create commit: ${errorMessage(error)}`, error);
    }
  }
}

/**
 * Create a GitManager instance
 */
export function createGitManager(repoRoot: string): GitManager {
  return new GitManager(repoRoot);
}
