import type { ClassifiedFailure } from "./error_classifier";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

export type RetryDecision =
  | { action: "retry"; delayMs: number; nextRetryCount: number }
  | { action: "fail"; reason: "fatal" | "retries_exhausted" };

/** Exponential backoff for the given 1-based retry number, capped at maxDelayMs. */
export function backoffDelayMs(policy: RetryPolicy, retryNumber: number): number {
  const exponent = Math.max(0, retryNumber - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

export function decideRetry(
  policy: RetryPolicy,
  failure: ClassifiedFailure,
  retryCount: number
): RetryDecision {
  if (failure.classification === "fatal") {
    return { action: "fail", reason: "fatal" };
  }
  if (retryCount >= policy.maxRetries) {
    return { action: "fail", reason: "retries_exhausted" };
  }

  const nextRetryCount = retryCount + 1;
  const backoff = backoffDelayMs(policy, nextRetryCount);
  // A collaborator's Retry-After hint can lengthen the wait, never past the cap.
  const delayMs =
    typeof failure.retryAfterMs === "number"
      ? Math.min(policy.maxDelayMs, Math.max(backoff, failure.retryAfterMs))
      : backoff;
  return { action: "retry", delayMs, nextRetryCount };
}
