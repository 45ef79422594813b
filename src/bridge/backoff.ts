/** Delay in ms before the next attempt, given how many attempts in a row have failed. */
export type BackoffPolicy = (consecutiveFailures: number) => number;

export const immediateRetry: BackoffPolicy = () => 0;

/**
 * Exponential backoff with ±25% jitter, capped at `maxDelayMs`.
 * An `initialDelayMs` of 0 degrades to immediate retry.
 */
export function exponentialBackoff(params: {
  initialDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
}): BackoffPolicy {
  const random = params.random ?? Math.random;
  return (consecutiveFailures) => {
    if (params.initialDelayMs <= 0 || consecutiveFailures <= 0) return 0;
    const base = params.initialDelayMs * Math.pow(2, consecutiveFailures - 1);
    const jittered = base * (0.75 + random() * 0.5);
    return Math.min(Math.round(jittered), params.maxDelayMs);
  };
}
