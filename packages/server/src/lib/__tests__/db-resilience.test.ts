import { describe, it, expect, vi, afterEach } from 'vitest';
import { errorCode, withRetry } from '../db-resilience.js';

class DriverError extends Error {
  constructor(
    readonly code: string,
    message = 'pg error',
  ) {
    super(message);
  }
}

describe('errorCode', () => {
  it('reads a string code off driver errors', () => {
    expect(errorCode(new DriverError('55P03'))).toBe('55P03');
    expect(errorCode({ code: 'SQLITE_BUSY' })).toBe('SQLITE_BUSY');
  });

  it('is undefined for anything without a string code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 5 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
    expect(errorCode('SQLITE_BUSY')).toBeUndefined();
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('succeeds on first try without retrying', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries on retryable error and succeeds', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new DriverError('40001')).mockResolvedValue('ok');
    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('propagates non-retryable error immediately', async () => {
    const fn = vi.fn().mockRejectedValue(new DriverError('23505', 'unique_violation'));
    await expect(withRetry(fn)).rejects.toThrow('unique_violation');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry a lock timeout', async () => {
    const fn = vi.fn().mockRejectedValue(new DriverError('55P03', 'lock timeout'));
    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow('lock timeout');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws last error after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(new DriverError('08000', 'connection lost'));
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('connection lost');
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it('retries all retryable PG error codes', async () => {
    for (const code of ['08000', '08003', '08006', '40001', '40P01', '57P01']) {
      const fn = vi.fn().mockRejectedValueOnce(new DriverError(code)).mockResolvedValue('ok');
      await expect(withRetry(fn, { maxRetries: 1, baseDelayMs: 1 })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    }
  });

  it('does not retry plain errors without code', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('random'));
    await expect(withRetry(fn)).rejects.toThrow('random');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
