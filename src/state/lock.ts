import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';

/**
 * Lock file extension
 */
const LOCK_EXTENSION = '.lock';

export interface LockOptions {
  /** Maximum lock wait time in milliseconds */
  maxWaitMs?: number;
  /** Lock file retry interval in milliseconds */
  retryIntervalMs?: number;
  /** Locks older than this are considered abandoned by a crashed run */
  staleAfterMs?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  maxWaitMs: 30_000,
  retryIntervalMs: 100,
  staleAfterMs: 5 * 60 * 1000,
};

export class LockTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Get the lock file path for a file
 */
export function getLockPath(filePath: string): string {
  return path.resolve(filePath) + LOCK_EXTENSION;
}

function isLockStale(lockPath: string, staleAfterMs: number): boolean {
  try {
    const stats = fs.statSync(lockPath);
    return Date.now() - stats.mtimeMs > staleAfterMs;
  } catch {
    // Vanished between our create attempt and the stat: let the next attempt decide
    return false;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Acquire an exclusive lock next to a file, using exclusive file creation
 *
 * @returns The lock ID to pass to releaseLock
 * @throws LockTimeoutError if the lock cannot be acquired within maxWaitMs
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<string> {
  const { maxWaitMs, retryIntervalMs, staleAfterMs } = { ...DEFAULT_LOCK_OPTIONS, ...options };
  const lockPath = getLockPath(filePath);
  const lockId = crypto.randomUUID();
  const startTime = Date.now();

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      fs.writeFileSync(lockPath, JSON.stringify({
        id: lockId,
        pid: process.pid,
        timestamp: new Date().toISOString(),
      }), { flag: 'wx' });
      return lockId;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }

      if (isLockStale(lockPath, staleAfterMs)) {
        fs.rmSync(lockPath, { force: true });
        continue;
      }

      if (Date.now() - startTime > maxWaitMs) {
        throw new LockTimeoutError(`Failed to acquire lock for ${filePath}: timeout after ${maxWaitMs}ms`);
      }

      await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
    }
  }
}

/**
 * Release a lock, only when it is still ours
 *
 * @returns false when the lock was missing or held by someone else
 */
export function releaseLock(filePath: string, lockId: string): boolean {
  const lockPath = getLockPath(filePath);

  let content: string;
  try {
    content = fs.readFileSync(lockPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }

  let owner: unknown;
  try {
    owner = JSON.parse(content);
  } catch {
    return false;
  }
  if (typeof owner !== 'object' || owner === null || !('id' in owner) || owner.id !== lockId) {
    return false;
  }

  fs.rmSync(lockPath, { force: true });
  return true;
}
