import { describe, expect, it, vi } from 'vitest';

import { calculateDelay, withDatabaseRetrySync, withRetry } from '../../../src/shared/utils/retry.js';

describe('Retry Utilities', () => {
  describe('withRetry', () => {
    it('returns result on first success', async () => {
      const operation = vi.fn(() => 'success');

      const result = await withRetry(operation);

      expect(result).toBe('success');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('retries on retryable error', async () => {
      let attempts = 0;
      const operation = vi.fn(() => {
        attempts++;
        if (attempts < 3) {
          throw new Error('transient error');
        }
        return 'success';
      });

      const result = await withRetry(operation, {
        maxAttempts: 5,
        isRetryable: () => true,
        initialDelayMs: 1,
      });

      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });

    it('throws on non-retryable error', async () => {
      const operation = vi.fn(() => {
        throw new Error('permanent error');
      });

      await expect(withRetry(operation, { maxAttempts: 5, isRetryable: () => false })).rejects.toThrow(
        'permanent error'
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('throws after max attempts', async () => {
      const operation = vi.fn(() => {
        throw new Error('always fails');
      });

      await expect(
        withRetry(operation, { maxAttempts: 3, isRetryable: () => true, initialDelayMs: 1 })
      ).rejects.toThrow('always fails');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('calls onRetry with attempt, error and delay', async () => {
      const failure = new Error('retry me');
      let attempts = 0;
      const onRetry = vi.fn();

      const result = await withRetry(
        () => {
          attempts++;
          if (attempts < 3) throw failure;
          return 'done';
        },
        { maxAttempts: 5, isRetryable: () => true, initialDelayMs: 1, jitter: 0, onRetry }
      );

      expect(result).toBe('done');
      expect(onRetry.mock.calls).toEqual([
        [1, failure, 1],
        [2, failure, 2],
      ]);
    });

    it('stops retrying at the deadline', async () => {
      const operation = vi.fn(() => {
        throw new Error('not yet');
      });
      const startedAt = Date.now();

      await expect(
        withRetry(operation, {
          maxAttempts: Infinity,
          initialDelayMs: 10,
          backoffMultiplier: 1,
          jitter: 0,
          deadlineMs: 60,
          isRetryable: () => true,
        })
      ).rejects.toThrow('not yet');

      expect(operation.mock.calls.length).toBeGreaterThan(1);
      expect(Date.now() - startedAt).toBeLessThan(1000);
    });
  });

  describe('calculateDelay', () => {
    it('grows exponentially up to the cap', () => {
      expect(calculateDelay(1, 50, 2000, 2, 0)).toBe(50);
      expect(calculateDelay(3, 50, 2000, 2, 0)).toBe(200);
      expect(calculateDelay(10, 50, 2000, 2, 0)).toBe(2000);
    });

    it('keeps jitter within its fraction', () => {
      for (let i = 0; i < 50; i++) {
        const delay = calculateDelay(1, 100, 2000, 2, 0.25);
        expect(delay).toBeGreaterThanOrEqual(75);
        expect(delay).toBeLessThanOrEqual(125);
      }
    });
  });

  describe('withDatabaseRetrySync', () => {
    it('retries busy errors', () => {
      let attempts = 0;
      const result = withDatabaseRetrySync(
        () => {
          attempts++;
          if (attempts < 3) {
            throw Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
          }
          return 'ok';
        },
        'test write',
        { initialDelayMs: 1 }
      );

      expect(result).toBe('ok');
      expect(attempts).toBe(3);
    });

    it('does not retry other errors', () => {
      const operation = vi.fn(() => {
        throw new Error('UNIQUE constraint failed');
      });

      expect(() => withDatabaseRetrySync(operation, 'test write')).toThrow('UNIQUE constraint failed');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
