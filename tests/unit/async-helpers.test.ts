import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout, TimeoutError, Semaphore, sleep } from '../../src/utils/async-helpers.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve if promise completes within timeout', async () => {
    const result = await withTimeout(Promise.resolve('success'), 1000, 'test operation');
    expect(result).toBe('success');
  });

  it('should throw TimeoutError if promise exceeds timeout', async () => {
    const slowPromise = new Promise((resolve) => {
      setTimeout(() => resolve('too late'), 500);
    });

    await expect(withTimeout(slowPromise, 50, 'slow operation')).rejects.toThrow(TimeoutError);
  });

  it('should use the given message and record the timeout', async () => {
    const slowPromise = new Promise((resolve) => {
      setTimeout(() => resolve('too late'), 500);
    });

    const error = await withTimeout(slowPromise, 50, 'custom operation').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'custom operation', timeoutMs: 50 });
  });

  it('should fall back to a default message', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise(() => undefined), 20);
    const assertion = expect(pending).rejects.toThrow('Operation timed out after 20ms');
    await vi.advanceTimersByTimeAsync(20);
    await assertion;
  });

  it('should run the timeout hook before rejecting', async () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn();
    const pending = withTimeout(new Promise(() => undefined), 10, 'hooked', onTimeout);
    const assertion = expect(pending).rejects.toThrow('hooked');
    await vi.advanceTimersByTimeAsync(10);
    await assertion;
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should not run the timeout hook when the promise wins', async () => {
    const onTimeout = vi.fn();
    await withTimeout(Promise.resolve(1), 10, 'fast', onTimeout);
    await sleep(20);
    expect(onTimeout).not.toHaveBeenCalled();
  });
});

describe('Semaphore', () => {
  it('should limit concurrent access', async () => {
    const semaphore = new Semaphore(2);
    let concurrent = 0;
    let maxConcurrent = 0;

    const task = async () => {
      await semaphore.acquire();
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await new Promise((r) => setTimeout(r, 50));
      concurrent--;
      semaphore.release();
    };

    await Promise.all([task(), task(), task(), task()]);
    expect(maxConcurrent).toBe(2);
  });

  it('should work with withLock helper', async () => {
    const semaphore = new Semaphore(1);
    const results: number[] = [];

    await Promise.all([
      semaphore.withLock(async () => {
        results.push(1);
        await new Promise((r) => setTimeout(r, 20));
        results.push(2);
      }),
      semaphore.withLock(async () => {
        results.push(3);
        await new Promise((r) => setTimeout(r, 20));
        results.push(4);
      }),
    ]);

    expect(results).toEqual([1, 2, 3, 4]);
  });

  it('should release the permit when the locked function throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.withLock(() => {
      throw new Error('inside lock');
    })).rejects.toThrow('inside lock');

    expect(semaphore.available).toBe(1);
    expect(semaphore.waiting).toBe(0);
  });

  it('should report waiters', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const second = semaphore.acquire();

    expect(semaphore.available).toBe(0);
    expect(semaphore.waiting).toBe(1);

    semaphore.release();
    await second;
    expect(semaphore.waiting).toBe(0);
    semaphore.release();
    expect(semaphore.available).toBe(1);
  });
});
