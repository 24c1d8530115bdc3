import { ListingSeed, Task, TaskEvent } from "../types";
import { SiteAdapter, isParseFailure } from "../sites/types";
import { extractListing } from "./extractor";
import { Fetcher, describeStatus } from "./fetcher";
import { Logger, silentLogger } from "./logger";
import { StatsAccumulator } from "./stats";
import { normalizeUrl } from "./utils";

/**
 * Receives each newly discovered detail task. Resolving `false` means
 * the consumer is closed and the walk should stop.
 */
export type DetailSink = (task: Task) => Promise<boolean>;

export interface DiscovererOptions {
  site: SiteAdapter;
  fetcher: Fetcher;
  stats: StatsAccumulator;
  maxPages: number;
  filter?: RegExp | null;
  logger?: Logger;
  signal?: AbortSignal;
  /** Called after every listing fetch, successful or not */
  onListingDone?: (event: TaskEvent) => void;
}

export interface SeedOutcome {
  seed: ListingSeed;
  pagesVisited: number;
  detailLinks: number;
  /** The first page of this seed could not be fetched or parsed */
  unreachable: boolean;
  stoppedBy: "no-new-links" | "max-pages" | "no-next-page" | "failed-page" | "closed";
}

/**
 * Walks paginated listings and emits each detail URL once per run.
 * Pagination is driven only by the adapter's `parseListing` result.
 */
export class LinkDiscoverer {
  private readonly seen = new Set<string>();
  private readonly logger: Logger;

  constructor(private readonly options: DiscovererOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Offer a detail URL. Returns the task if it is new and passes the
   * filter, otherwise null.
   */
  admit(url: string, category?: string): Task | null {
    if (this.options.filter && !this.options.filter.test(url)) return null;
    const key = normalizeUrl(url);
    if (this.seen.has(key)) {
      this.options.stats.increment("duplicatesSkipped");
      return null;
    }
    this.seen.add(key);
    this.options.stats.increment("discovered");
    return Object.freeze({ url, kind: "detail", category });
  }

  /**
   * Walk one category until a page yields no new links, the page cap is
   * hit, or there is no next page.
   */
  async walk(seed: ListingSeed, emit: DetailSink): Promise<SeedOutcome> {
    const { fetcher, site, stats, maxPages, signal } = this.options;
    const outcome: SeedOutcome = {
      seed,
      pagesVisited: 0,
      detailLinks: 0,
      unreachable: false,
      stoppedBy: "max-pages",
    };

    let pageUrl: string | null = seed.url;
    let pageIndex = 1;

    while (pageUrl && pageIndex <= maxPages) {
      if (signal?.aborted) {
        outcome.stoppedBy = "closed";
        return outcome;
      }

      const task: Task = Object.freeze({
        url: pageUrl,
        kind: "listing",
        pageIndex,
        category: seed.category,
      });
      stats.increment("attempted");
      const result = await fetcher.fetch(task, signal);
      stats.increment("retries", Math.max(0, result.attempts - 1));

      if (result.status.kind === "aborted") {
        stats.increment("abandoned");
        this.options.onListingDone?.({ task, ok: false, status: result.status, records: 0, error: "aborted" });
        outcome.stoppedBy = "closed";
        return outcome;
      }

      const page = extractListing(site, result);
      if (isParseFailure(page)) {
        stats.increment("failed");
        if (result.status.kind === "ok") stats.increment("parseFailures");
        const reason = result.status.kind === "ok" ? page.reason : describeStatus(result.status);
        this.logger.warn(`listing ${pageUrl} failed: ${reason}`);
        this.options.onListingDone?.({ task, ok: false, status: result.status, records: 0, error: reason });
        outcome.unreachable = pageIndex === 1;
        outcome.stoppedBy = "failed-page";
        return outcome;
      }

      stats.increment("succeeded");
      stats.increment("pagesVisited");
      outcome.pagesVisited++;
      this.options.onListingDone?.({ task, ok: true, status: result.status, records: 0 });

      let fresh = 0;
      for (const url of page.detailUrls) {
        const detail = this.admit(url, seed.category);
        if (!detail) continue;
        fresh++;
        if (!(await emit(detail))) {
          stats.increment("abandoned");
          outcome.detailLinks += fresh;
          outcome.stoppedBy = "closed";
          return outcome;
        }
      }
      outcome.detailLinks += fresh;
      this.logger.debug(
        `${seed.category} page ${pageIndex}: ${page.detailUrls.length} links, ${fresh} new`
      );

      if (fresh === 0) {
        outcome.stoppedBy = "no-new-links";
        return outcome;
      }
      if (!page.nextPageUrl) {
        outcome.stoppedBy = "no-next-page";
        return outcome;
      }
      pageUrl = page.nextPageUrl;
      pageIndex++;
    }

    return outcome;
  }

  /** Walk every seed concurrently, emitting as links are found. */
  async walkAll(seeds: ListingSeed[], emit: DetailSink): Promise<SeedOutcome[]> {
    return Promise.all(seeds.map((seed) => this.walk(seed, emit)));
  }
}
