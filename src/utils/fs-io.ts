import { appendFile, mkdir, open, readdir, readFile, rename, rm } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import { errnoOf, IOFailureError } from '../core/errors.js';
import type { RetryOptions } from '../types/config.js';
import { DEFAULT_RETRY, withRetry } from './retry.js';

/**
 * Run one file-system call with transient-error retries, converting whatever
 * finally escapes into an IOFailureError that names the path.
 */
async function io<T>(action: string, filePath: string, fn: () => Promise<T>, retry: RetryOptions): Promise<T> {
  try {
    return await withRetry(fn, `${action} ${filePath}`, retry);
  } catch (err) {
    if (err instanceof IOFailureError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new IOFailureError(`Failed to ${action} ${filePath}: ${message}`, filePath, errnoOf(err), err);
  }
}

export async function readText(filePath: string, retry: RetryOptions = DEFAULT_RETRY): Promise<string> {
  return io('read', filePath, () => readFile(filePath, 'utf-8'), retry);
}

/**
 * Read a file, returning null when it does not exist.
 */
export async function readTextIfExists(filePath: string, retry: RetryOptions = DEFAULT_RETRY): Promise<string | null> {
  try {
    return await readText(filePath, retry);
  } catch (err) {
    if (err instanceof IOFailureError && err.errno === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Replace a file's contents atomically: write a sibling temp file, fsync it,
 * then rename it over the target.
 */
export async function writeTextAtomic(filePath: string, content: string, retry: RetryOptions = DEFAULT_RETRY): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await io('create directory', dir, () => mkdir(dir, { recursive: true }), retry);
  try {
    await io('write', tempPath, async () => {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    }, retry);
    await io('rename', tempPath, () => rename(tempPath, filePath), retry);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

export async function appendText(filePath: string, content: string, retry: RetryOptions = DEFAULT_RETRY): Promise<void> {
  const dir = dirname(filePath);
  await io('create directory', dir, () => mkdir(dir, { recursive: true }), retry);
  await io('append to', filePath, () => appendFile(filePath, content, 'utf-8'), retry);
}

export async function moveFile(fromPath: string, toPath: string, retry: RetryOptions = DEFAULT_RETRY): Promise<void> {
  const dir = dirname(toPath);
  await io('create directory', dir, () => mkdir(dir, { recursive: true }), retry);
  await io('rename', fromPath, () => rename(fromPath, toPath), retry);
}

/**
 * List a directory's entries, or [] when it does not exist.
 */
export async function listDir(dirPath: string, retry: RetryOptions = DEFAULT_RETRY): Promise<string[]> {
  try {
    return await io('list', dirPath, () => readdir(dirPath), retry);
  } catch (err) {
    if (err instanceof IOFailureError && err.errno === 'ENOENT') return [];
    throw err;
  }
}
