import { Clock } from "../src/core/clock";
import { Fetcher, LoadedPage, PageLoader } from "../src/core/fetcher";
import { CrawlPipeline, PipelineConfig, PipelineDeps } from "../src/core/pipeline";
import { SiteAdapter, parseFailure } from "../src/sites/types";
import { MemorySink } from "../src/sinks/memory-sink";
import { Sink } from "../src/sinks/types";
import { ScrapedRecord } from "../src/types";

export const T0 = Date.parse("2026-01-01T00:00:00.000Z");

export interface ManualClock extends Clock {
  sleeps: number[];
}

/** Clock whose sleeps return at once and advance time by the requested amount. */
export function manualClock(start = T0): ManualClock {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    async sleep(ms) {
      sleeps.push(ms);
      now += ms;
    },
  };
}

export type Route = LoadedPage | Error | ((call: number) => LoadedPage | Error);

export interface RouteLoader {
  load: PageLoader;
  calls: string[];
  count(url: string): number;
}

/** In-process stand-in for the network. Unknown URLs answer 404. */
export function routeLoader(routes: Record<string, Route>): RouteLoader {
  const calls: string[] = [];
  const count = (url: string) => calls.filter((c) => c === url).length;
  const load: PageLoader = async (url) => {
    calls.push(url);
    await Promise.resolve();
    const route = routes[url];
    if (route === undefined) return { status: 404, body: "" };
    const resolved = typeof route === "function" ? route(count(url)) : route;
    if (resolved instanceof Error) throw resolved;
    return resolved;
  };
  return { load, calls, count };
}

export function page(body: unknown, status = 200): LoadedPage {
  return { status, body: JSON.stringify(body) };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Site whose pages are JSON: listings are `{ links, next }`,
 * detail pages `{ title, price }`.
 */
export const jsonSite: SiteAdapter = {
  name: "json-test",
  defaultBaseUrl: "https://shop.test",
  defaultCategories: ["books"],
  listingSeeds: (baseUrl, categories) =>
    categories.map((category) => ({ category, url: `${baseUrl}/${category}/page-1` })),
  parseListing(body, pageUrl) {
    const data: unknown = JSON.parse(body);
    if (!isObject(data) || !Array.isArray(data.links)) {
      return parseFailure(pageUrl, "no links array");
    }
    return {
      detailUrls: data.links.filter((l): l is string => typeof l === "string"),
      nextPageUrl: typeof data.next === "string" ? data.next : null,
    };
  },
  parseDetail(body, task) {
    const data: unknown = JSON.parse(body);
    if (!isObject(data) || typeof data.title !== "string") {
      return parseFailure(task.url, "missing title");
    }
    return { title: data.title, price: data.price };
  },
  recordKey: (record) => record.sourceUrl,
};

/** Two listing pages leading to three detail pages. */
export function shopRoutes(): Record<string, Route> {
  return {
    "https://shop.test/books/page-1": page({
      links: ["https://shop.test/p/1", "https://shop.test/p/2"],
      next: "https://shop.test/books/page-2",
    }),
    "https://shop.test/books/page-2": page({
      links: ["https://shop.test/p/3"],
      next: null,
    }),
    "https://shop.test/p/1": page({ title: "Alpha", price: "10.00" }),
    "https://shop.test/p/2": page({ title: "Beta", price: "12.50" }),
    "https://shop.test/p/3": page({ title: "Gamma", price: "7.25" }),
  };
}

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    baseUrl: "https://shop.test",
    categories: ["books"],
    workers: 2,
    queueCapacity: 4,
    perHostConcurrency: 2,
    maxPages: 10,
    strategy: "lazy",
    writeAttempts: 3,
    writeBaseDelayMs: 10,
    ...overrides,
  };
}

export interface TestRun {
  pipeline: CrawlPipeline;
  loader: RouteLoader;
  clock: ManualClock;
}

export function makePipeline(
  routes: Record<string, Route>,
  options: {
    config?: Partial<PipelineConfig>;
    sink?: Sink;
    site?: SiteAdapter;
    maxAttempts?: number;
    onTaskDone?: PipelineDeps["onTaskDone"];
    onStateChange?: PipelineDeps["onStateChange"];
  } = {}
): TestRun {
  const loader = routeLoader(routes);
  const clock = manualClock();
  const fetcher = new Fetcher({
    loader: loader.load,
    policy: { maxAttempts: options.maxAttempts ?? 3, baseDelayMs: 100, jitterMs: 0 },
    clock,
    random: () => 0,
  });
  const pipeline = new CrawlPipeline(testConfig(options.config), {
    site: options.site ?? jsonSite,
    fetcher,
    sink: options.sink ?? new MemorySink(),
    clock,
    onTaskDone: options.onTaskDone,
    onStateChange: options.onStateChange,
  });
  return { pipeline, loader, clock };
}

export function record(sourceUrl: string, fields: Record<string, unknown> = {}): ScrapedRecord {
  return Object.freeze({
    fields: Object.freeze({ ...fields }),
    sourceUrl,
    scrapedAt: new Date(T0).toISOString(),
  });
}

/** Sink that accepts `okCalls` inserts and then fails every call. */
export class FlakySink extends MemorySink {
  calls = 0;

  constructor(private readonly okCalls: number) {
    super();
  }

  async insert(rec: ScrapedRecord): Promise<void> {
    this.calls++;
    if (this.calls > this.okCalls) throw new Error("database is locked");
    await super.insert(rec);
  }
}

/** Let queued promise callbacks and timers run. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));
