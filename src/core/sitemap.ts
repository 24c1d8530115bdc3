import { XMLParser } from "fast-xml-parser";
import { Task } from "../types";
import { Fetcher, describeStatus } from "./fetcher";
import { DiscoveryError } from "./errors";
import { Logger, silentLogger } from "./logger";
import { StatsAccumulator } from "./stats";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  isArray: (name) => name === "sitemap" || name === "url",
});

/** Maximum nesting of sitemap index files followed */
const MAX_INDEX_DEPTH = 3;

function locs(entries: unknown): string[] {
  if (!Array.isArray(entries)) return [];
  const urls: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "object" && entry !== null && "loc" in entry) {
      const loc = entry.loc;
      if (typeof loc === "string" && loc.trim()) urls.push(loc.trim());
    }
  }
  return urls;
}

/**
 * Pull page URLs out of sitemap XML.
 * @returns `urls` for a url set, `sitemaps` for a sitemap index
 */
export function parseSitemapXml(xml: string): { urls: string[]; sitemaps: string[] } {
  const parsed: unknown = xmlParser.parse(xml);
  if (typeof parsed !== "object" || parsed === null) return { urls: [], sitemaps: [] };

  const sitemaps =
    "sitemapindex" in parsed && typeof parsed.sitemapindex === "object" && parsed.sitemapindex !== null && "sitemap" in parsed.sitemapindex
      ? locs(parsed.sitemapindex.sitemap)
      : [];
  const urls =
    "urlset" in parsed && typeof parsed.urlset === "object" && parsed.urlset !== null && "url" in parsed.urlset
      ? locs(parsed.urlset.url)
      : [];
  return { urls, sitemaps };
}

export interface SitemapOptions {
  fetcher: Fetcher;
  stats: StatsAccumulator;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Fetch a sitemap or sitemap index (recursively) and return every page URL.
 * Each sitemap fetch counts as a listing task. The root being unreachable
 * is a DiscoveryError; a broken child sitemap is logged and skipped, and
 * a fetch cut short by shutdown yields nothing.
 */
export async function fetchSitemapUrls(
  sitemapUrl: string,
  options: SitemapOptions,
  depth = 0
): Promise<string[]> {
  const { fetcher, stats, signal } = options;
  const logger = options.logger ?? silentLogger;
  logger.info(`Fetching sitemap: ${sitemapUrl}`);

  const task: Task = Object.freeze({ url: sitemapUrl, kind: "listing", pageIndex: 1 });
  stats.increment("attempted");
  const result = await fetcher.fetch(task, signal);
  stats.increment("retries", Math.max(0, result.attempts - 1));

  if (result.status.kind === "aborted") {
    stats.increment("abandoned");
    return [];
  }
  if (result.status.kind !== "ok") {
    stats.increment("failed");
    const message = `Could not fetch sitemap at ${sitemapUrl}: ${result.error ?? describeStatus(result.status)}`;
    if (depth === 0) throw new DiscoveryError(message);
    logger.warn(message);
    return [];
  }
  stats.increment("succeeded");
  stats.increment("pagesVisited");

  let parsed: { urls: string[]; sitemaps: string[] };
  try {
    parsed = parseSitemapXml(result.body);
  } catch (err) {
    stats.increment("parseFailures");
    const message = `Malformed sitemap at ${sitemapUrl}`;
    if (depth === 0) throw new DiscoveryError(message, { cause: err });
    logger.warn(message);
    return [];
  }

  if (parsed.sitemaps.length > 0) {
    logger.info(`Found sitemap index with ${parsed.sitemaps.length} child sitemap(s)`);
    if (depth >= MAX_INDEX_DEPTH) {
      logger.warn(`Sitemap nesting deeper than ${MAX_INDEX_DEPTH} ignored at ${sitemapUrl}`);
      return parsed.urls;
    }
    const allUrls = [...parsed.urls];
    for (const child of parsed.sitemaps) {
      if (signal?.aborted) break;
      allUrls.push(...(await fetchSitemapUrls(child, options, depth + 1)));
    }
    return allUrls;
  }

  if (parsed.urls.length === 0) {
    logger.warn(`No URLs found in ${sitemapUrl}`);
  }
  return parsed.urls;
}
