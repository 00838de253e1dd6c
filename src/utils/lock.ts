import { writeFile, readFile, unlink, stat, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LOCK_MAX_WAIT_MS, LOCK_POLL_INTERVAL_MS, LOCK_STALE_MS } from '../constants.js';
import { errnoOf, LockTimeoutError } from '../core/errors.js';
import type { LockOptions } from '../types/config.js';
import { logger } from './logger.js';

export const DEFAULT_LOCK: LockOptions = {
  staleMs: LOCK_STALE_MS,
  pollIntervalMs: LOCK_POLL_INTERVAL_MS,
  maxWaitMs: LOCK_MAX_WAIT_MS,
};

interface LockData {
  pid: number;
  acquiredAt: string;
}

/**
 * Acquire an exclusive lock file using `wx` (exclusive create) flag.
 * If the lock already exists, check if it's stale. If stale, remove and retry.
 * Otherwise, poll until `maxWaitMs` has passed.
 */
export async function acquireLock(lockPath: string, options: LockOptions = DEFAULT_LOCK): Promise<void> {
  const lockData: LockData = {
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
  };

  await mkdir(dirname(lockPath), { recursive: true });
  const deadline = Date.now() + options.maxWaitMs;

  while (true) {
    try {
      await writeFile(lockPath, JSON.stringify(lockData), { flag: 'wx' });
      return; // lock acquired
    } catch (err: unknown) {
      if (errnoOf(err) !== 'EEXIST') throw err;

      // Lock file exists; break it if stale
      if (await checkStale(lockPath, options.staleMs)) {
        try {
          await unlink(lockPath);
          logger.debug(`Removed stale lock file ${lockPath}, retrying...`);
          continue;
        } catch (unlinkErr: unknown) {
          // Another process may have removed it already
          if (errnoOf(unlinkErr) !== 'ENOENT') throw unlinkErr;
        }
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(lockPath, options.maxWaitMs);
      }

      await sleep(options.pollIntervalMs);
    }
  }
}

/**
 * Release the lock file.
 */
export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err: unknown) {
    if (errnoOf(err) !== 'ENOENT') throw err;
    // Already removed
  }
}

/**
 * Execute `fn` while holding an exclusive lock.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>, options: LockOptions = DEFAULT_LOCK): Promise<T> {
  await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}

function isLockData(value: unknown): value is LockData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'acquiredAt' in value &&
    typeof value.acquiredAt === 'string'
  );
}

async function checkStale(lockPath: string, staleMs: number): Promise<boolean> {
  let acquiredAt: number | null = null;
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf-8'));
    if (isLockData(parsed)) acquiredAt = new Date(parsed.acquiredAt).getTime();
  } catch (err: unknown) {
    // Released between our create attempt and this read
    if (errnoOf(err) === 'ENOENT') return false;
  }

  if (acquiredAt !== null && !Number.isNaN(acquiredAt)) {
    return Date.now() - acquiredAt > staleMs;
  }

  // Unreadable or half-written lock: fall back to the file's mtime
  try {
    const st = await stat(lockPath);
    return Date.now() - st.mtimeMs > staleMs;
  } catch (err: unknown) {
    if (errnoOf(err) === 'ENOENT') return false;
    throw err;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
