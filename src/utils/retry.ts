export class RetryAbortedError extends Error {
  constructor(message = 'Retry sequence aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  jitter: number; // fraction of the delay, applied symmetrically
  maxTotalMs: number;
}

export interface RetryOptions extends BackoffPolicy {
  shouldRetry: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: SleepFn;
  now?: () => number;
  random?: () => number;
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function backoffDelay(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  const raw = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const spread = policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(raw * (1 + spread)));
}

/**
 * Runs `operation` until it succeeds, a non-retryable error surfaces, the
 * attempt budget is spent, the next delay would cross `maxTotalMs`, or the
 * signal aborts. The last error is rethrown unchanged.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof RetryAbortedError) throw error;
      if (attempt >= options.maxAttempts || !options.shouldRetry(error, attempt)) {
        throw error;
      }

      const delayMs = backoffDelay(options, attempt, options.random);
      if (now() - startedAt + delayMs > options.maxTotalMs) {
        throw error;
      }

      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}
