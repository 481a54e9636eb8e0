export type Sleep = (ms: number) => Promise<void>;

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  stepDelayMs?: number;
  sleep?: Sleep;
}

/**
 * Bounded attempts with a linear backoff: attempt n waits
 * `baseDelayMs + stepDelayMs * n` before the next try.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly stepDelayMs: number;
  private readonly sleeper: Sleep;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 0);
    this.stepDelayMs = Math.max(0, options.stepDelayMs ?? 200);
    this.sleeper = options.sleep ?? delay;
  }

  delayFor(attempt: number): number {
    return this.baseDelayMs + this.stepDelayMs * Math.max(0, attempt);
  }

  async backoff(attempt: number): Promise<void> {
    const ms = this.delayFor(attempt);
    if (ms > 0) {
      await this.sleeper(ms);
    }
  }
}

export interface RetryAttemptFailure {
  attempt: number;
  error: unknown;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number; failures: RetryAttemptFailure[] }
  | { ok: false; attempts: number; failures: RetryAttemptFailure[] };

/**
 * Runs `task` until it resolves or the policy runs out of attempts. Never rejects:
 * an exhausted run resolves with `ok: false` and every failure.
 */
export async function retryWithPolicy<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  onFailure?: (failure: RetryAttemptFailure) => void,
): Promise<RetryOutcome<T>> {
  const failures: RetryAttemptFailure[] = [];

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt, failures };
    } catch (error) {
      const failure = { attempt, error };
      failures.push(failure);
      onFailure?.(failure);
      if (attempt < policy.maxAttempts) {
        await policy.backoff(attempt);
      }
    }
  }

  return { ok: false, attempts: policy.maxAttempts, failures };
}
