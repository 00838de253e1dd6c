import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { IOFailureError } from '../src/core/errors.js';
import { appendText, listDir, moveFile, readText, readTextIfExists, writeTextAtomic } from '../src/utils/fs-io.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

const RETRY = { retries: 0, baseDelayMs: 1 };

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'taskboard-fsio-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('writeTextAtomic', () => {
  it('should create parent directories and leave no temp files', async () => {
    const target = join(tempDir, 'a', 'b', 'record.md');
    await writeTextAtomic(target, 'first', RETRY);
    await writeTextAtomic(target, 'second', RETRY);

    expect(await readFile(target, 'utf-8')).toBe('second');
    expect(await readdir(join(tempDir, 'a', 'b'))).toEqual(['record.md']);
  });

  it('should report failures as IOFailureError and clean up', async () => {
    const target = join(tempDir, 'occupied');
    await mkdir(target);
    await writeFile(join(target, 'keep.txt'), 'x');

    const error = await writeTextAtomic(target, 'content', RETRY).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IOFailureError);
    expect(await readdir(tempDir)).toEqual(['occupied']);
  });
});

describe('readText', () => {
  it('should carry the errno of the failure', async () => {
    const error = await readText(tempDir, RETRY).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(IOFailureError);
    expect(error instanceof IOFailureError ? error.errno : undefined).toBe('EISDIR');
  });
});

describe('readTextIfExists', () => {
  it('should return null for a missing file', async () => {
    expect(await readTextIfExists(join(tempDir, 'missing.md'), RETRY)).toBeNull();
  });

  it('should return the content of an existing file', async () => {
    await writeFile(join(tempDir, 'present.md'), 'hello');
    expect(await readTextIfExists(join(tempDir, 'present.md'), RETRY)).toBe('hello');
  });
});

describe('appendText', () => {
  it('should append lines in order', async () => {
    const log = join(tempDir, 'logs', 'activity.log');
    await appendText(log, 'one\n', RETRY);
    await appendText(log, 'two\n', RETRY);
    expect(await readFile(log, 'utf-8')).toBe('one\ntwo\n');
  });
});

describe('moveFile', () => {
  it('should create the target directory', async () => {
    const from = join(tempDir, 'inbox', 'task-001.md');
    const to = join(tempDir, 'blocked', 'task-001.md');
    await mkdir(join(tempDir, 'inbox'));
    await writeFile(from, 'record');

    await moveFile(from, to, RETRY);

    expect(await readFile(to, 'utf-8')).toBe('record');
    expect(await listDir(join(tempDir, 'inbox'), RETRY)).toEqual([]);
  });
});

describe('listDir', () => {
  it('should return an empty list for a missing directory', async () => {
    expect(await listDir(join(tempDir, 'nowhere'), RETRY)).toEqual([]);
  });
});
