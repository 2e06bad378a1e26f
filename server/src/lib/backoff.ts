export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 15000,
  jitter: true
};

/**
 * Zero-wait policy for tests and for callers that handle pacing themselves.
 */
export const IMMEDIATE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitter: false
};

/**
 * Delay before the reconnect that follows `failures` consecutive failures.
 * Exponential from baseDelayMs, capped at maxDelayMs; with jitter the result
 * falls in the upper half of the capped value.
 */
export function computeBackoffDelay(
  failures: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  if (failures <= 0 || policy.baseDelayMs <= 0) {
    return 0;
  }

  const exponential = policy.baseDelayMs * Math.pow(2, failures - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);

  if (!policy.jitter) {
    return capped;
  }

  const half = capped / 2;
  return Math.round(half + random() * half);
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Settles with `promise`, or rejects early with the signal's reason.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
