import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  RetryPolicy,
  RetryError,
  calculateBackoff,
  isRetryableStatus,
  retry,
  DEFAULT_RETRY_CONFIG,
} from '../../src/services/retry.js';
import { AuthError, ConfigError } from '../../src/lib/errors.js';

describe('calculateBackoff', () => {
  const config = { ...DEFAULT_RETRY_CONFIG, baseDelayMs: 100, backoffFactor: 2, maxDelayMs: 1000 };

  it('should grow exponentially from the base delay', () => {
    expect(calculateBackoff(1, config)).toBe(100);
    expect(calculateBackoff(2, config)).toBe(200);
    expect(calculateBackoff(3, config)).toBe(400);
  });

  it('should cap at maxDelayMs', () => {
    expect(calculateBackoff(10, config)).toBe(1000);
  });

  it('should return 0 when the base delay is 0', () => {
    expect(calculateBackoff(3, { ...config, baseDelayMs: 0 })).toBe(0);
  });

  it('should add at most 10% jitter', () => {
    const delay = calculateBackoff(1, { ...config, jitter: true });
    expect(delay).toBeGreaterThanOrEqual(100);
    expect(delay).toBeLessThanOrEqual(110);
  });
});

describe('isRetryableStatus', () => {
  it('should match transient statuses only', () => {
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(404)).toBe(false);
  });
});

describe('RetryPolicy', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject maxAttempts below 1', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });

  it('should return on the first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(RetryPolicy.fixed(3, 0).execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry failures and pass the attempt number', async () => {
    const fn = vi
      .fn<(context: { attempt: number }) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(RetryPolicy.fixed(3, 0).execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenNthCalledWith(1, { attempt: 1 });
    expect(fn).toHaveBeenNthCalledWith(2, { attempt: 2 });
  });

  it('should throw RetryError after exhausting attempts', async () => {
    const original = new Error('down');
    const fn = vi.fn().mockRejectedValue(original);

    const error = await RetryPolicy.fixed(3, 0)
      .execute(fn, { operation: 'ping' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ message: 'ping failed after 3 attempts', attempts: 3, originalError: original });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should throw RetryError when the only attempt fails', async () => {
    const original = new AuthError('login failed');

    const error = await RetryPolicy.none()
      .execute(() => Promise.reject(original), { operation: 'login' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ message: 'login failed after 1 attempts', attempts: 1, originalError: original });
  });

  it('should not retry errors outside retryOn', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, retryOn: [AuthError] });
    const fn = vi.fn().mockRejectedValue(new ConfigError('bad'));

    await expect(policy.execute(fn)).rejects.toBeInstanceOf(ConfigError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should consult shouldRetry', async () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 0, shouldRetry: (_error, attempt) => attempt < 2 });
    const fn = vi.fn().mockRejectedValue(new Error('nope'));

    await expect(policy.execute(fn)).rejects.toThrow('nope');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should retry results rejected by shouldRetryResult and return the last one', async () => {
    const fn = vi.fn<() => Promise<number>>().mockResolvedValueOnce(500).mockResolvedValueOnce(503).mockResolvedValue(502);

    const result = await RetryPolicy.fixed(3, 0).execute(fn, { shouldRetryResult: (code) => code !== 200 });

    expect(result).toBe(502);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should call onRetry with the computed delay', async () => {
    const onRetry = vi.fn();
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0, onRetry });
    const failure = new Error('once');

    await policy.execute(vi.fn().mockRejectedValueOnce(failure).mockResolvedValueOnce('ok'));

    expect(onRetry).toHaveBeenCalledWith(failure, 1, 0);
  });

  it('should wait between attempts', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn().mockRejectedValueOnce(new Error('slow')).mockResolvedValueOnce('ok');
      const promise = RetryPolicy.fixed(2, 1000).execute(fn);

      await vi.advanceTimersByTimeAsync(999);
      expect(fn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('retry', () => {
  it('should use the given config', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fn = vi.fn().mockRejectedValueOnce(new Error('x')).mockResolvedValueOnce('done');

    await expect(retry(fn, { baseDelayMs: 0 })).resolves.toBe('done');
    vi.restoreAllMocks();
  });
});
