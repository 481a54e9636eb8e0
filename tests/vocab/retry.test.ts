import { describe, expect, it, vi } from 'vitest';

import { RetryPolicy, retryWithPolicy } from '../../scripts/vocab/retry';

describe('RetryPolicy', () => {
  it('computes a linear backoff from base and step', () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 400, stepDelayMs: 400 });
    expect(policy.delayFor(1)).toBe(800);
    expect(policy.delayFor(2)).toBe(1200);
  });

  it('clamps attempts to at least one and skips zero-length sleeps', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 0, stepDelayMs: 0, sleep });

    await policy.backoff(3);

    expect(policy.maxAttempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('retryWithPolicy', () => {
  it('resolves with the first success and the failures before it', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 3, stepDelayMs: 200, sleep });
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('done');

    const outcome = await retryWithPolicy(policy, task);

    expect(outcome.ok).toBe(true);
    expect(outcome.ok && outcome.value).toBe('done');
    expect(outcome.attempts).toBe(2);
    expect(outcome.failures.map((failure) => failure.attempt)).toEqual([1]);
    expect(task).toHaveBeenNthCalledWith(2, 2);
    expect(sleep).toHaveBeenCalledWith(200);
  });

  it('never rejects and reports every failure once exhausted', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 3, stepDelayMs: 100, sleep });
    const onFailure = vi.fn();

    const outcome = await retryWithPolicy(
      policy,
      async (attempt) => {
        throw new Error(`attempt ${attempt}`);
      },
      onFailure,
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    expect(onFailure).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });
});
