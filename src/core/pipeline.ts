import {
  DiscoveryStrategy,
  ListingSeed,
  PipelineOutcome,
  PipelineReport,
  PipelineState,
  ScrapedRecord,
  Task,
  TaskEvent,
} from "../types";
import { SiteAdapter, isParseFailure } from "../sites/types";
import { Sink } from "../sinks/types";
import { Clock, systemClock } from "./clock";
import { LinkDiscoverer } from "./discoverer";
import { DiscoveryError, FatalPipelineError } from "./errors";
import { extractRecords } from "./extractor";
import { Fetcher, describeStatus } from "./fetcher";
import { SeedRow } from "./file-reader";
import { HostLimiter } from "./host-limiter";
import { Logger, silentLogger } from "./logger";
import { BoundedQueue } from "./queue";
import { fetchSitemapUrls } from "./sitemap";
import { StatsAccumulator } from "./stats";
import { formatDuration, getErrorMessage } from "./utils";
import { runWorkerPool } from "./worker-pool";
import { PersistenceWriter } from "./writer";

export interface PipelineConfig {
  baseUrl: string;
  categories: string[];
  workers: number;
  /** Capacity of both the work and the result queue */
  queueCapacity: number;
  perHostConcurrency: number;
  maxPages: number;
  strategy: DiscoveryStrategy;
  filter?: RegExp | null;
  /** Discover from this sitemap instead of walking listings */
  sitemapUrl?: string;
  /** Detail URLs read from a file; replaces the listing walk */
  seedRows?: SeedRow[];
  writeAttempts?: number;
  writeBaseDelayMs?: number;
}

export interface PipelineDeps {
  site: SiteAdapter;
  fetcher: Fetcher;
  sink: Sink;
  clock?: Clock;
  logger?: Logger;
  onTaskDone?: (event: TaskEvent) => void;
  onStateChange?: (state: PipelineState) => void;
}

const TERMINAL: ReadonlySet<PipelineState> = new Set(["done", "failed", "interrupted"]);

/**
 * Wires discovery, the worker pool and the single writer for one run.
 *
 * idle -> discovering -> dispatching -> draining -> done | failed | interrupted
 *
 * `run` always resolves with a report, even when the run fails.
 */
export class CrawlPipeline {
  private currentState: PipelineState = "idle";
  private readonly stats = new StatsAccumulator();
  private readonly abort = new AbortController();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly limiter: HostLimiter;
  private readonly work: BoundedQueue<Task>;
  private readonly results: BoundedQueue<ScrapedRecord>;
  private failReason: string | null = null;
  private interruptReason: string | null = null;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.limiter = new HostLimiter(config.perHostConcurrency);
    this.work = new BoundedQueue<Task>(config.queueCapacity);
    this.results = new BoundedQueue<ScrapedRecord>(config.queueCapacity);
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /** Live counters, for progress display */
  get progress() {
    return this.stats.snapshot();
  }

  /**
   * Cooperative stop: no new tasks are accepted or started, queued tasks
   * are abandoned, in-flight fetches finish and extracted records are
   * still written. The run ends as `interrupted`.
   */
  shutdown(reason = "shutdown requested"): void {
    if (TERMINAL.has(this.currentState) || this.abort.signal.aborted) return;
    this.interruptReason = reason;
    this.logger.warn(`Stopping: ${reason}`);
    this.stopDispatch();
  }

  async run(): Promise<PipelineReport> {
    if (this.currentState !== "idle") {
      throw new Error(`pipeline already ${this.currentState}`);
    }
    const startedAt = this.clock.now();
    const { sink } = this.deps;

    try {
      await sink.open();
    } catch (err) {
      this.failReason = `cannot open ${sink.description}: ${getErrorMessage(err)}`;
      return this.finish(startedAt);
    }

    const writer = new PersistenceWriter({
      sink,
      queue: this.results,
      stats: this.stats,
      maxAttempts: this.config.writeAttempts,
      baseDelayMs: this.config.writeBaseDelayMs,
      clock: this.clock,
      logger: this.logger,
    });
    const writing = writer.run().then((result) => {
      if (!result.ok) this.fail(result.error);
      return result;
    });

    let pool: Promise<number> | null = null;
    const startPool = (): Promise<number> => {
      if (pool) return pool;
      pool = runWorkerPool(
        this.work,
        {
          concurrency: this.config.workers,
          logger: this.logger,
          signal: this.abort.signal,
          onHandlerError: (task, err) => {
            this.stats.increment("failed");
            this.notify({ task, ok: false, status: { kind: "network_error" }, records: 0, error: getErrorMessage(err) });
          },
        },
        (task) => this.process(task)
      );
      return pool;
    };

    this.transition("discovering");
    try {
      if (this.config.strategy === "lazy") {
        startPool();
        await this.discover((task) => this.work.push(task));
      } else {
        const tasks: Task[] = [];
        await this.discover(async (task) => {
          tasks.push(task);
          return true;
        });
        this.logger.info(`Discovered ${tasks.length} detail page(s); dispatching`);
        this.transition("dispatching");
        startPool();
        for (const task of tasks) {
          if (!(await this.work.push(task))) {
            this.stats.increment("abandoned", tasks.length - tasks.indexOf(task));
            break;
          }
        }
      }
    } catch (err) {
      this.fail(err);
    }

    this.transition("dispatching");
    this.work.close();
    await startPool();

    this.transition("draining");
    this.results.close();
    await writing;

    try {
      await sink.close();
    } catch (err) {
      this.fail(new FatalPipelineError(`closing ${sink.description} failed: ${getErrorMessage(err)}`));
    }

    return this.finish(startedAt);
  }

  /** Feed detail tasks to `emit` from whichever discovery source is configured. */
  private async discover(emit: (task: Task) => Promise<boolean>): Promise<void> {
    const { site, fetcher } = this.deps;
    const discoverer = new LinkDiscoverer({
      site,
      fetcher,
      stats: this.stats,
      maxPages: this.config.maxPages,
      filter: this.config.filter,
      logger: this.logger,
      signal: this.abort.signal,
      onListingDone: (event) => this.notify(event),
    });

    if (this.config.sitemapUrl || this.config.seedRows) {
      const rows: SeedRow[] = [...(this.config.seedRows ?? [])];
      if (this.config.sitemapUrl) {
        const urls = await fetchSitemapUrls(this.config.sitemapUrl, {
          fetcher,
          stats: this.stats,
          logger: this.logger,
          signal: this.abort.signal,
        });
        rows.push(...urls.map((url) => ({ url })));
      }
      this.logger.info(`Seeding ${rows.length} detail URL(s)`);
      for (const row of rows) {
        const task = discoverer.admit(row.url, row.category);
        if (task && !(await emit(task))) {
          this.stats.increment("abandoned");
          return;
        }
      }
      return;
    }

    const seeds: ListingSeed[] = site.listingSeeds(this.config.baseUrl, this.config.categories);
    if (seeds.length === 0) throw new DiscoveryError("no listing seeds configured");

    const outcomes = await discoverer.walkAll(seeds, emit);
    for (const o of outcomes) {
      this.logger.info(
        `${o.seed.category}: ${o.pagesVisited} page(s), ${o.detailLinks} detail link(s), stopped: ${o.stoppedBy}`
      );
    }
    if (this.abort.signal.aborted) return;
    if (outcomes.every((o) => o.unreachable)) {
      throw new DiscoveryError(
        `no listing page reachable (${seeds.map((s) => s.url).join(", ")})`
      );
    }
  }

  /** Worker body for one detail task. Failures become counters, never throws. */
  private async process(task: Task): Promise<void> {
    const { fetcher, site } = this.deps;
    this.stats.increment("attempted");
    const result = await this.limiter.run(task.url, () => fetcher.fetch(task, this.abort.signal));
    this.stats.increment("retries", Math.max(0, result.attempts - 1));

    if (result.status.kind === "aborted") {
      this.stats.increment("abandoned");
      this.notify({ task, ok: false, status: result.status, records: 0, error: "aborted" });
      return;
    }
    if (result.status.kind !== "ok") {
      this.stats.increment("failed");
      const error = result.error ?? describeStatus(result.status);
      this.logger.warn(`${task.url}: ${error} after ${result.attempts} attempt(s)`);
      this.notify({ task, ok: false, status: result.status, records: 0, error });
      return;
    }

    const extracted = extractRecords(site, result);
    if (isParseFailure(extracted)) {
      this.stats.increment("failed");
      this.stats.increment("parseFailures");
      this.logger.warn(`${task.url}: ${extracted.reason}`);
      this.notify({ task, ok: false, status: result.status, records: 0, error: extracted.reason });
      return;
    }

    this.stats.increment("succeeded");
    let queued = 0;
    for (const record of extracted) {
      if (!(await this.results.push(record))) {
        this.logger.warn(`${extracted.length - queued} record(s) from ${task.url} dropped: writer stopped`);
        break;
      }
      queued++;
    }
    this.notify({ task, ok: true, status: result.status, records: queued });
  }

  private fail(err: unknown): void {
    const message =
      err instanceof FatalPipelineError ? `${err.name}: ${err.message}` : getErrorMessage(err);
    if (!this.failReason) {
      this.failReason = message;
      this.logger.error(message);
    }
    this.stopDispatch();
  }

  private stopDispatch(): void {
    if (!this.abort.signal.aborted) this.abort.abort();
    this.work.close();
    const pending = this.work.drain().length;
    if (pending > 0) this.stats.increment("abandoned", pending);
  }

  private notify(event: TaskEvent): void {
    this.deps.onTaskDone?.(event);
  }

  private transition(next: PipelineState): void {
    if (this.currentState === next) return;
    this.currentState = next;
    this.logger.debug(`pipeline: ${next}`);
    this.deps.onStateChange?.(next);
  }

  private finish(startedAt: number): PipelineReport {
    const outcome: PipelineOutcome = this.failReason
      ? "failed"
      : this.interruptReason
        ? "interrupted"
        : "done";
    this.transition(outcome);
    const finishedAt = this.clock.now();
    const report: PipelineReport = {
      outcome,
      stats: this.stats.finalize(),
      elapsedMs: finishedAt - startedAt,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
    };
    const reason = this.failReason ?? this.interruptReason;
    if (reason) report.reason = reason;
    return report;
  }
}

/** One-line summary written at the end of every run. */
export function formatReport(report: PipelineReport): string {
  const s = report.stats;
  const base =
    `${report.outcome.toUpperCase()} in ${formatDuration(report.elapsedMs)}: ` +
    `attempted=${s.attempted} succeeded=${s.succeeded} failed=${s.failed} ` +
    `records_written=${s.recordsWritten}`;
  const extras = [
    s.retries > 0 ? `retries=${s.retries}` : "",
    s.parseFailures > 0 ? `parse_failures=${s.parseFailures}` : "",
    s.writeFailures > 0 ? `write_failures=${s.writeFailures}` : "",
    s.abandoned > 0 ? `abandoned=${s.abandoned}` : "",
  ].filter(Boolean);
  const tail = report.reason ? ` (${report.reason})` : "";
  return [base, ...extras].join(" ") + tail;
}

export function exitCodeFor(outcome: PipelineOutcome): number {
  switch (outcome) {
    case "done":
      return 0;
    case "failed":
      return 1;
    case "interrupted":
      return 130;
  }
}
