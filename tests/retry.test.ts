import { describe, it, expect } from "vitest";
import {
  RetryPolicy,
  afterAttempt,
  backoffDelay,
  initialRetryState,
  isRetryableHttpStatus,
  resume,
} from "../src/core/retry";
import { Task } from "../src/types";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000, jitterMs: 500 };
const task: Task = { url: "https://shop.test/p/1", kind: "detail" };
const noJitter = () => 0;

describe("backoffDelay", () => {
  it("doubles per attempt and adds jitter", () => {
    expect(backoffDelay(1, policy, noJitter)).toBe(1000);
    expect(backoffDelay(2, policy, noJitter)).toBe(2000);
    expect(backoffDelay(3, policy, noJitter)).toBe(4000);
    expect(backoffDelay(1, policy, () => 0.5)).toBe(1250);
  });

  it("caps the exponential term at maxDelayMs", () => {
    expect(backoffDelay(10, policy, noJitter)).toBe(30_000);
  });
});

describe("isRetryableHttpStatus", () => {
  it("retries throttling and server errors only", () => {
    expect(isRetryableHttpStatus(429)).toBe(true);
    expect(isRetryableHttpStatus(503)).toBe(true);
    expect(isRetryableHttpStatus(500)).toBe(true);
    expect(isRetryableHttpStatus(404)).toBe(false);
    expect(isRetryableHttpStatus(403)).toBe(false);
  });
});

describe("retry state machine", () => {
  it("succeeds on the first ok attempt", () => {
    const next = afterAttempt(initialRetryState(task, 0), { kind: "ok" }, policy, 0, noJitter);
    expect(next.phase).toEqual({ kind: "succeeded" });
    expect(next.attemptCount).toBe(1);
  });

  it("ends immediately on a non-retryable status", () => {
    const next = afterAttempt(
      initialRetryState(task, 0),
      { kind: "http_error", code: 404 },
      policy,
      0,
      noJitter
    );
    expect(next.phase).toEqual({ kind: "exhausted" });
    expect(next.attemptCount).toBe(1);
  });

  it("backs off between retryable failures and exhausts at maxAttempts", () => {
    let state = initialRetryState(task, 0);
    state = afterAttempt(state, { kind: "timeout" }, policy, 100, noJitter);
    expect(state.phase).toEqual({ kind: "backoff", until: 1100 });
    expect(state.nextEligibleTime).toBe(1100);

    state = afterAttempt(resume(state), { kind: "network_error" }, policy, 1200, noJitter);
    expect(state.phase).toEqual({ kind: "backoff", until: 3200 });

    state = afterAttempt(resume(state), { kind: "http_error", code: 503 }, policy, 3300, noJitter);
    expect(state.phase).toEqual({ kind: "exhausted" });
    expect(state.attemptCount).toBe(3);
  });
});
