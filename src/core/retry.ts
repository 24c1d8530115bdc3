import { FetchStatus, Task } from "../types";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the random term added to every backoff */
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterMs: 500,
};

const RETRYABLE_STATUS = new Set([408, 425, 429]);

export function isRetryableHttpStatus(code: number): boolean {
  return RETRYABLE_STATUS.has(code) || (code >= 500 && code <= 599);
}

export function isRetryable(status: FetchStatus): boolean {
  switch (status.kind) {
    case "network_error":
    case "timeout":
      return true;
    case "http_error":
      return isRetryableHttpStatus(status.code);
    default:
      return false;
  }
}

/**
 * Backoff before attempt `attempt + 1`:
 * min(maxDelay, base * 2^(attempt-1)) + random() * jitter
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number
): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, exponential) + random() * policy.jitterMs;
}

export type RetryPhase =
  | { kind: "attempting" }
  | { kind: "backoff"; until: number }
  | { kind: "succeeded" }
  | { kind: "exhausted" };

/** Retry bookkeeping for one task, owned by a single fetch call. */
export interface RetryState {
  task: Task;
  attemptCount: number;
  nextEligibleTime: number;
  phase: RetryPhase;
}

export function initialRetryState(task: Task, now: number): RetryState {
  return { task, attemptCount: 0, nextEligibleTime: now, phase: { kind: "attempting" } };
}

/**
 * Transition after an attempt finished with `status`.
 * Non-retryable failures end in `exhausted` without consuming the budget.
 */
export function afterAttempt(
  state: RetryState,
  status: FetchStatus,
  policy: RetryPolicy,
  now: number,
  random: () => number
): RetryState {
  const attemptCount = state.attemptCount + 1;
  if (status.kind === "ok") {
    return { ...state, attemptCount, phase: { kind: "succeeded" } };
  }
  if (!isRetryable(status) || attemptCount >= policy.maxAttempts) {
    return { ...state, attemptCount, phase: { kind: "exhausted" } };
  }
  const until = now + backoffDelay(attemptCount, policy, random);
  return {
    ...state,
    attemptCount,
    nextEligibleTime: until,
    phase: { kind: "backoff", until },
  };
}

/** Backoff elapsed: attempt again. */
export function resume(state: RetryState): RetryState {
  return { ...state, phase: { kind: "attempting" } };
}
