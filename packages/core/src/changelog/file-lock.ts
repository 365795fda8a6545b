/**
 * Changelog lock
 *
 * Concurrent commits append to the same changelog. Each writer first creates
 * `<changelog>.lock` with the exclusive flag and records who holds it; a lock
 * whose mtime is older than the stale timeout is taken over.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import { z } from 'zod';
import { LockError, createLogger, isErrnoException } from '@commitwright/shared';

const logger = createLogger('file-lock');

export interface LockOptions {
  /** Give up after this many milliseconds (default 30000) */
  timeout?: number;
  /** Pause between attempts in milliseconds (default 100) */
  retryInterval?: number;
  /** Age in milliseconds after which a held lock is taken over (default 60000) */
  staleTimeout?: number;
}

export interface LockHandle {
  filePath: string;
  lockPath: string;
  release: () => Promise<void>;
}

const DEFAULTS: Required<LockOptions> = {
  timeout: 30000,
  retryInterval: 100,
  staleTimeout: 60000,
};

const LockOwnerSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  createdAt: z.string(),
});

export type LockOwner = z.infer<typeof LockOwnerSchema>;

export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

function errorCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readOwner(lockPath: string): Promise<LockOwner | undefined> {
  try {
    const parsed = LockOwnerSchema.safeParse(JSON.parse(await fs.readFile(lockPath, 'utf-8')));
    return parsed.success ? parsed.data : undefined;
  } catch (error: unknown) {
    logger.debug('Lock owner unreadable', { lockPath, error: errorMessage(error) });
    return undefined;
  }
}

/**
 * Take the lock over when it is older than the stale timeout
 *
 * @returns true when the lock file is gone and the next attempt may succeed
 */
async function clearIfStale(lockPath: string, staleTimeout: number): Promise<boolean> {
  let age: number;
  try {
    age = Date.now() - (await fs.stat(lockPath)).mtimeMs;
  } catch (error: unknown) {
    if (errorCode(error) === 'ENOENT') {
      return true;
    }
    throw new LockError(`Cannot inspect lock ${lockPath}: ${errorMessage(error)}`, error);
  }

  if (age <= staleTimeout) {
    return false;
  }

  logger.warn('Taking over stale changelog lock', { lockPath, ageSeconds: Math.round(age / 1000) });
  try {
    await fs.unlink(lockPath);
  } catch (error: unknown) {
    if (errorCode(error) !== 'ENOENT') {
      throw new LockError(`Cannot remove stale lock ${lockPath}: ${errorMessage(error)}`, error);
    }
  }
  return true;
}

function describeOwner(owner: LockOwner | undefined): string {
  return owner ? `pid ${owner.pid} on ${owner.hostname} since ${owner.createdAt}` : 'another process';
}

/**
 * Create the lock file, waiting while another writer holds it
 *
 * @throws LockError naming the holder when the timeout passes
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<LockHandle> {
  const { timeout, retryInterval, staleTimeout } = { ...DEFAULTS, ...options };
  const lockPath = lockPathFor(filePath);
  const deadline = Date.now() + timeout;

  while (true) {
    const owner: LockOwner = { pid: process.pid, hostname: os.hostname(), createdAt: new Date().toISOString() };
    try {
      await fs.writeFile(lockPath, JSON.stringify(owner), { flag: 'wx' });
      return { filePath, lockPath, release: () => releaseLock(lockPath) };
    } catch (error: unknown) {
      if (errorCode(error) !== 'EEXIST') {
        throw new LockError(`Cannot create lock ${lockPath}: ${errorMessage(error)}`, error);
      }
    }

    if (await clearIfStale(lockPath, staleTimeout)) {
      continue;
    }

    if (Date.now() >= deadline) {
      const holder = await readOwner(lockPath);
      throw new LockError(
        `Failed to acquire lock on ${filePath} within ${timeout}ms: held by ${describeOwner(holder)}. ` +
          `Remove ${lockPath} if that process is gone.`,
        holder
      );
    }

    await new Promise(resolve => setTimeout(resolve, retryInterval));
  }
}

async function releaseLock(lockPath: string): Promise<void> {
  try {
    await fs.unlink(lockPath);
  } catch (error: unknown) {
    if (errorCode(error) !== 'ENOENT') {
      logger.warn('Failed to release lock', { lockPath, error: errorMessage(error) });
    }
  }
}

/**
 * Run fn while holding the lock; the lock is released whether fn succeeds or throws
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const lock = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
