import { AxiosInstance } from "axios";
import { FetchResult, FetchStatus, Task } from "../types";
import { Clock, systemClock } from "./clock";
import { Logger, silentLogger } from "./logger";
import {
  DEFAULT_RETRY_POLICY,
  RetryPolicy,
  RetryState,
  afterAttempt,
  initialRetryState,
  resume,
} from "./retry";
import { getErrorMessage, isTimeoutError } from "./utils";

/** Raw response of one page load */
export interface LoadedPage {
  status: number;
  body: string;
}

/**
 * One network request (or one headless page load) for a URL.
 * Throws on transport failure; resolves with any HTTP status.
 * Bounded by its own timeout rather than the run's shutdown signal.
 */
export type PageLoader = (url: string) => Promise<LoadedPage>;

/**
 * Page loader backed by an axios instance from `createHttpClient`.
 */
export function createAxiosLoader(http: AxiosInstance): PageLoader {
  return async (url) => {
    const response = await http.get<string>(url, { responseType: "text" });
    return {
      status: response.status,
      body: typeof response.data === "string" ? response.data : String(response.data ?? ""),
    };
  };
}

export interface FetcherOptions {
  loader: PageLoader;
  policy?: Partial<RetryPolicy>;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  /** Called once per retry scheduled */
  onRetry?: (state: RetryState, status: FetchStatus) => void;
}

interface AttemptOutcome {
  status: FetchStatus;
  body: string;
  error?: string;
}

/**
 * Fetches a task with bounded retries. `fetch` never throws: the caller
 * inspects `status` on the returned result.
 */
export class Fetcher {
  readonly policy: RetryPolicy;
  private readonly loader: PageLoader;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly onRetry?: FetcherOptions["onRetry"];

  constructor(options: FetcherOptions) {
    this.loader = options.loader;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
    this.onRetry = options.onRetry;
  }

  async fetch(task: Task, signal?: AbortSignal): Promise<FetchResult> {
    let state = initialRetryState(task, this.clock.now());
    let last: AttemptOutcome = { status: { kind: "aborted" }, body: "" };

    for (;;) {
      switch (state.phase.kind) {
        case "attempting": {
          // shutdown: no new attempt, in-flight ones run to completion
          if (signal?.aborted) {
            return this.result(task, state, { status: { kind: "aborted" }, body: "" });
          }
          last = await this.attempt(task.url);
          state = afterAttempt(state, last.status, this.policy, this.clock.now(), this.random);
          break;
        }
        case "backoff": {
          const wait = Math.max(0, state.phase.until - this.clock.now());
          this.logger.debug(
            `retry ${state.attemptCount + 1}/${this.policy.maxAttempts} for ${task.url} in ${Math.round(wait)}ms (${describeStatus(last.status)})`
          );
          this.onRetry?.(state, last.status);
          await this.clock.sleep(wait, signal);
          state = resume(state);
          break;
        }
        case "succeeded":
        case "exhausted":
          return this.result(task, state, last);
      }
    }
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    try {
      const page = await this.loader(url);
      if (page.status >= 200 && page.status < 300) {
        return { status: { kind: "ok" }, body: page.body };
      }
      return {
        status: { kind: "http_error", code: page.status },
        body: page.body,
        error: `HTTP ${page.status}`,
      };
    } catch (err) {
      return {
        status: isTimeoutError(err) ? { kind: "timeout" } : { kind: "network_error" },
        body: "",
        error: getErrorMessage(err),
      };
    }
  }

  private result(task: Task, state: RetryState, outcome: AttemptOutcome): FetchResult {
    const result: FetchResult = {
      task,
      body: outcome.body,
      status: outcome.status,
      fetchedAt: this.clock.now(),
      attempts: state.attemptCount,
    };
    if (outcome.status.kind !== "ok") {
      result.error = outcome.error ?? describeStatus(outcome.status);
    }
    return result;
  }
}

export function describeStatus(status: FetchStatus): string {
  switch (status.kind) {
    case "ok":
      return "ok";
    case "http_error":
      return `HTTP ${status.code}`;
    case "network_error":
      return "network error";
    case "timeout":
      return "timed out";
    case "aborted":
      return "aborted";
  }
}
