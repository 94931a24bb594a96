/**
 * Delay before retry `attempt` (1-based): base * 2^(attempt-1), capped at max.
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, Math.max(attempt, 1) - 1);
  return Math.min(delay, maxDelayMs);
};

/**
 * Resolves after `ms`, or early once `signal` aborts.
 */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
