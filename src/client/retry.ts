import { NetworkError, type RetryPolicy } from './types.js';
import { isTransientStatus } from './status.js';

// Internal helper: sleep for a given number of milliseconds
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 250,
  multiplier: 2,
  isTransient: isTransientStatus,
});

export interface RetryInfo {
  // 1-based number of the attempt that just failed
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: RetryInfo) => void;
}

/**
 * computeDelay — pure function returning the wait before retry number `retryIndex` (0-based).
 * Default policy: retryIndex=0 → 250 ms, retryIndex=1 → 500 ms.
 */
export function computeDelay(policy: RetryPolicy, retryIndex: number): number {
  return policy.initialDelayMs * Math.pow(policy.multiplier, retryIndex);
}

/**
 * executeWithRetry — runs one HTTP exchange with bounded retry.
 *
 * Retries when the thunk rejects with NetworkError or resolves with a status the
 * policy calls transient, as long as attempts remain. The last attempt's response
 * is returned whatever its status; a NetworkError on the last attempt is re-thrown.
 * All other errors are re-thrown immediately without retry.
 */
export async function executeWithRetry<R extends { statusCode: number }>(
  fn: () => Promise<R>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<R> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    const isLast = attempt >= policy.maxAttempts;
    let reason: string;

    try {
      const response = await fn();
      if (isLast || !policy.isTransient(response.statusCode)) {
        return response;
      }
      reason = `status ${response.statusCode}`;
    } catch (error) {
      if (isLast || !(error instanceof NetworkError)) {
        throw error;
      }
      reason = error.message;
    }

    const delayMs = computeDelay(policy, attempt - 1);
    hooks.onRetry?.({ attempt, delayMs, reason });
    await wait(delayMs);
  }
}
