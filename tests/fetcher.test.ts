import { describe, it, expect } from "vitest";
import { AxiosError } from "axios";
import { Fetcher } from "../src/core/fetcher";
import { Task } from "../src/types";
import { manualClock, routeLoader } from "./helpers";

const URL_1 = "https://shop.test/p/1";
const task: Task = { url: URL_1, kind: "detail" };

function fetcherFor(routes: Parameters<typeof routeLoader>[0], maxAttempts = 3) {
  const loader = routeLoader(routes);
  const clock = manualClock();
  const fetcher = new Fetcher({
    loader: loader.load,
    policy: { maxAttempts, baseDelayMs: 1000, jitterMs: 500 },
    clock,
    random: () => 0,
  });
  return { loader, clock, fetcher };
}

describe("Fetcher", () => {
  it("makes exactly maxAttempts attempts against a permanently failing host", async () => {
    const { loader, clock, fetcher } = fetcherFor({ [URL_1]: new Error("socket hang up") });

    const result = await fetcher.fetch(task);

    expect(loader.count(URL_1)).toBe(3);
    expect(result.attempts).toBe(3);
    expect(result.status).toEqual({ kind: "network_error" });
    expect(result.error).toBe("socket hang up");
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("returns a 404 at once without retrying", async () => {
    const { loader, clock, fetcher } = fetcherFor({ [URL_1]: { status: 404, body: "gone" } });

    const result = await fetcher.fetch(task);

    expect(loader.count(URL_1)).toBe(1);
    expect(result.status).toEqual({ kind: "http_error", code: 404 });
    expect(result.error).toBe("HTTP 404");
    expect(clock.sleeps).toEqual([]);
  });

  it("retries a 503 and returns the body of the successful attempt", async () => {
    const { loader, fetcher } = fetcherFor({
      [URL_1]: (call) => (call === 1 ? { status: 503, body: "" } : { status: 200, body: "<h1>ok</h1>" }),
    });

    const result = await fetcher.fetch(task);

    expect(loader.count(URL_1)).toBe(2);
    expect(result.status).toEqual({ kind: "ok" });
    expect(result.body).toBe("<h1>ok</h1>");
    expect(result.attempts).toBe(2);
    expect(result.error).toBeUndefined();
  });

  it("classifies axios timeouts", async () => {
    const { loader, fetcher } = fetcherFor(
      { [URL_1]: new AxiosError("timeout of 15000ms exceeded", "ECONNABORTED") },
      2
    );

    const result = await fetcher.fetch(task);

    expect(loader.count(URL_1)).toBe(2);
    expect(result.status).toEqual({ kind: "timeout" });
    expect(result.error).toBe("Request timed out");
  });

  it("starts no attempt once the signal is aborted", async () => {
    const { loader, fetcher } = fetcherFor({ [URL_1]: { status: 200, body: "x" } });
    const controller = new AbortController();
    controller.abort();

    const result = await fetcher.fetch(task, controller.signal);

    expect(loader.count(URL_1)).toBe(0);
    expect(result.status).toEqual({ kind: "aborted" });
    expect(result.attempts).toBe(0);
  });

  it("stops retrying when aborted during backoff", async () => {
    const controller = new AbortController();
    const loader = routeLoader({ [URL_1]: { status: 502, body: "" } });
    const fetcher = new Fetcher({
      loader: loader.load,
      policy: { maxAttempts: 5 },
      clock: manualClock(),
      random: () => 0,
      onRetry: () => controller.abort(),
    });

    const result = await fetcher.fetch(task, controller.signal);

    expect(loader.count(URL_1)).toBe(1);
    expect(result.status).toEqual({ kind: "aborted" });
    expect(result.attempts).toBe(1);
  });
});
