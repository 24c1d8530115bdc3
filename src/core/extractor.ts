import { FetchResult, ListingPage, ParseFailure, RecordFields, ScrapedRecord } from "../types";
import { SiteAdapter, isParseFailure, parseFailure } from "../sites/types";
import { describeStatus } from "./fetcher";
import { getErrorMessage } from "./utils";

export type ExtractResult = ScrapedRecord[] | ParseFailure;

/**
 * Map a fetched detail page to records. Total: a non-ok fetch, an empty
 * body or a throwing adapter all come back as ParseFailure.
 * Pure for a given result; `scrapedAt` is the fetch time.
 */
export function extractRecords(site: SiteAdapter, result: FetchResult): ExtractResult {
  const url = result.task.url;
  if (result.status.kind !== "ok") {
    return parseFailure(url, `nothing to parse: ${describeStatus(result.status)}`);
  }
  if (!result.body.trim()) {
    return parseFailure(url, "empty body");
  }

  let fields: RecordFields | ParseFailure;
  try {
    fields = site.parseDetail(result.body, result.task);
  } catch (err) {
    return parseFailure(url, `malformed content: ${getErrorMessage(err)}`);
  }
  if (isParseFailure(fields)) return fields;

  const record: ScrapedRecord = Object.freeze({
    fields: Object.freeze({ ...fields }),
    sourceUrl: url,
    scrapedAt: new Date(result.fetchedAt).toISOString(),
  });
  return [record];
}

/**
 * Listing counterpart of `extractRecords`: detail links plus the
 * next-page signal, or a ParseFailure.
 */
export function extractListing(site: SiteAdapter, result: FetchResult): ListingPage | ParseFailure {
  const url = result.task.url;
  if (result.status.kind !== "ok") {
    return parseFailure(url, `nothing to parse: ${describeStatus(result.status)}`);
  }
  try {
    return site.parseListing(result.body, url);
  } catch (err) {
    return parseFailure(url, `malformed listing: ${getErrorMessage(err)}`);
  }
}
