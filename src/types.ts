/** Purpose of a crawl task: a paginated listing page or a detail page */
export type TaskKind = "listing" | "detail";

/** A unit of crawl work. Frozen once created. */
export interface Task {
  readonly url: string;
  readonly kind: TaskKind;
  readonly pageIndex?: number;
  readonly category?: string;
}

export type FetchStatus =
  | { kind: "ok" }
  | { kind: "http_error"; code: number }
  | { kind: "network_error" }
  | { kind: "timeout" }
  | { kind: "aborted" };

/** Outcome of fetching one task, after retries */
export interface FetchResult {
  task: Task;
  body: string;
  status: FetchStatus;
  /** Epoch milliseconds of the last attempt */
  fetchedAt: number;
  attempts: number;
  error?: string;
}

/** Field values a site adapter pulls out of a detail page */
export type RecordFields = Record<string, unknown>;

/** Structured result extracted from one detail page. Frozen once built. */
export interface ScrapedRecord {
  readonly fields: Readonly<RecordFields>;
  readonly sourceUrl: string;
  /** ISO 8601 */
  readonly scrapedAt: string;
}

export interface ParseFailure {
  ok: false;
  url: string;
  reason: string;
}

/** Detail links and pagination signal found on one listing page */
export interface ListingPage {
  detailUrls: string[];
  nextPageUrl: string | null;
}

/** Starting point of a paginated walk */
export interface ListingSeed {
  category: string;
  url: string;
}

export type DiscoveryStrategy = "eager" | "lazy";

/** Counters shared by the worker pool and the writer */
export interface PipelineStats {
  attempted: number;
  succeeded: number;
  failed: number;
  recordsWritten: number;
  retries: number;
  parseFailures: number;
  writeFailures: number;
  pagesVisited: number;
  discovered: number;
  duplicatesSkipped: number;
  abandoned: number;
}

export type PipelineState =
  | "idle"
  | "discovering"
  | "dispatching"
  | "draining"
  | "done"
  | "failed"
  | "interrupted";

export type PipelineOutcome = Extract<
  PipelineState,
  "done" | "failed" | "interrupted"
>;

/** Final summary of a run. Always produced, whatever the outcome. */
export interface PipelineReport {
  outcome: PipelineOutcome;
  stats: PipelineStats;
  elapsedMs: number;
  /** Diagnostic for a failed or interrupted run */
  reason?: string;
  startedAt: string;
  finishedAt: string;
}

/** Per-task progress notification */
export interface TaskEvent {
  task: Task;
  ok: boolean;
  status: FetchStatus;
  records: number;
  error?: string;
}
