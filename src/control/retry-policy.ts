export type RetryDecision =
  | { action: "requeue"; nextRetryCount: number }
  | { action: "fail"; reason: "retry_exhausted" | "queue_full" };

/**
 * A job that has failed `retryCount` times so far may run again only while
 * `retryCount < maxRetries`, so it is dispatched at most `maxRetries + 1`
 * times in total.
 */
export function computeRetryDecision(input: {
  retryCount: number;
  maxRetries: number;
  queueFull: boolean;
}): RetryDecision {
  const maxRetries = Math.max(0, input.maxRetries);

  if (input.retryCount >= maxRetries) {
    return { action: "fail", reason: "retry_exhausted" };
  }
  if (input.queueFull) {
    return { action: "fail", reason: "queue_full" };
  }
  return { action: "requeue", nextRetryCount: input.retryCount + 1 };
}
