/**
 * Utility functions shared across commitwright packages
 */

import * as path from 'path';
import * as fs from 'fs/promises';

/**
 * Get the .commitwright directory path for a repository
 */
export function getConfigDir(repoRoot: string): string {
  return path.join(repoRoot, '.commitwright');
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the root of the enclosing git repository
 */
export async function findGitRoot(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (true) {
    if (await exists(path.join(currentDir, '.git'))) {
      return currentDir;
    }
    if (currentDir === root) {
      return null;
    }
    currentDir = path.dirname(currentDir);
  }
}

/**
 * Ensure a directory exists, create it if not
 */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error: unknown) {
    if (!isErrnoException(error) || error.code !== 'EEXIST') {
      throw error;
    }
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Truncate text to a maximum length, marking the cut
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}\n... [truncated ${text.length - maxLength} chars]`;
}

/**
 * Pluralize a noun by count
 */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
