import { Result } from "./result";

/**
 * One policy shape for every retried call site (probes, search queries, downloads);
 * each passes its own parameters.
 *
 * delay(n) = min(maxDelayMs, baseDelayMs * multiplier^(n-1) * (1 + jitter * random()))
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitter: number;
}

export interface RetryOptions<E> {
  isRetryable: (error: E) => boolean;
  sleep: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (error: E, attempt: number, delayMs: number) => void;
  shouldStop?: () => boolean;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** Math.max(0, attempt - 1);
  const jittered = exponential * (1 + policy.jitter * random());
  return Math.floor(Math.min(jittered, policy.maxDelayMs));
}

export async function retryResult<T, E>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>,
): Promise<Result<T, E>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let attempt = 1;

  while (true) {
    const result = await operation(attempt);
    if (result.ok) {
      return result;
    }
    if (attempt >= maxAttempts || !options.isRetryable(result.error) || options.shouldStop?.()) {
      return result;
    }

    const delayMs = backoffDelay(policy, attempt, options.random);
    options.onRetry?.(result.error, attempt, delayMs);
    await options.sleep(delayMs);
    attempt += 1;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
