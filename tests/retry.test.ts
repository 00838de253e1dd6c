import { describe, it, expect, vi, beforeEach } from 'vitest';
import { isTransientIOError, withRetry } from '../src/utils/retry.js';
import { logger } from '../src/utils/logger.js';

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

const FAST = { retries: 3, baseDelayMs: 1 };

function ioError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('isTransientIOError', () => {
  it('should accept busy and exhausted-resource codes', () => {
    expect(isTransientIOError(ioError('EBUSY'))).toBe(true);
    expect(isTransientIOError(ioError('EMFILE'))).toBe(true);
  });

  it('should reject permanent failures and plain errors', () => {
    expect(isTransientIOError(ioError('ENOENT'))).toBe(false);
    expect(isTransientIOError(new Error('plain'))).toBe(false);
    expect(isTransientIOError('EBUSY')).toBe(false);
  });
});

describe('withRetry', () => {
  it('should retry transient failures until the call succeeds', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(ioError('EBUSY'))
      .mockRejectedValueOnce(ioError('EAGAIN'))
      .mockResolvedValueOnce('ok');

    expect(await withRetry(fn, 'read file', FAST)).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'read file failed (attempt 1/4), retrying in 1ms...');
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'read file failed (attempt 2/4), retrying in 2ms...');
  });

  it('should not retry permanent failures', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(ioError('ENOENT'));
    await expect(withRetry(fn, 'read file', FAST)).rejects.toThrow('ENOENT: simulated');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error once attempts run out', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(ioError('EBUSY'));
    await expect(withRetry(fn, 'write file', { retries: 2, baseDelayMs: 1 })).rejects.toThrow('EBUSY: simulated');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should honour a custom retry predicate', async () => {
    const fn = vi.fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(7);
    expect(await withRetry(fn, 'compute', FAST, () => true)).toBe(7);
  });
});
