import { ListingPage, ListingSeed, ParseFailure, RecordFields, ScrapedRecord, Task } from "../types";

/**
 * Site-specific markup knowledge. Both parse functions must be pure
 * and may throw on malformed markup; the extractor turns throws into
 * ParseFailure values.
 */
export interface SiteAdapter {
  name: string;
  defaultBaseUrl: string;
  defaultCategories: string[];
  /** First listing page of each category */
  listingSeeds(baseUrl: string, categories: string[]): ListingSeed[];
  parseListing(body: string, pageUrl: string): ListingPage | ParseFailure;
  parseDetail(body: string, task: Task): RecordFields | ParseFailure;
  /** Natural unique key used by upserting sinks */
  recordKey(record: ScrapedRecord): string;
}

export function parseFailure(url: string, reason: string): ParseFailure {
  return { ok: false, url, reason };
}

export function isParseFailure(value: unknown): value is ParseFailure {
  return (
    typeof value === "object" &&
    value !== null &&
    "ok" in value &&
    value.ok === false &&
    "reason" in value
  );
}

/** Cheap check that a body is markup at all before handing it to cheerio */
export function looksLikeHtml(body: string): boolean {
  return /<[a-z!]/i.test(body);
}
