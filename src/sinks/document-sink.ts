import * as fs from "fs";
import * as path from "path";
import { ScrapedRecord } from "../types";
import { RecordKeyFn, Sink, bySourceUrl } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

export type DocumentFormat = "json" | "csv";

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
export function escapeCsv(value: string | number | boolean | null | undefined): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** Flatten a field value into one CSV cell: arrays joined with "|", objects as JSON */
function formatCell(value: unknown): string {
  if (value == null) return "";
  if (Array.isArray(value)) return value.map((v) => formatCell(v)).join("|");
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Render records as CSV. Field columns are generated from every key found
 * in the data, sorted for a stable column order.
 */
export function recordsToCsv(records: ScrapedRecord[]): string {
  const keySet = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record.fields)) keySet.add(key);
  }
  const fieldKeys = Array.from(keySet).sort();
  const headers = [...fieldKeys, "source_url", "scraped_at"];

  const lines: string[] = [BOM + headers.map(escapeCsv).join(",")];
  for (const record of records) {
    const cells = [
      ...fieldKeys.map((k) => formatCell(record.fields[k])),
      record.sourceUrl,
      record.scrapedAt,
    ];
    lines.push(cells.map(escapeCsv).join(","));
  }
  return lines.join("\n") + "\n";
}

/** Render records as a pretty-printed JSON array. */
export function recordsToJson(records: ScrapedRecord[]): string {
  const rows = records.map((r) => ({
    ...r.fields,
    source_url: r.sourceUrl,
    scraped_at: r.scrapedAt,
  }));
  return JSON.stringify(rows, null, 2) + "\n";
}

/**
 * Structured document written once, when the sink closes. Records are
 * buffered by key, so a page seen twice ends up in the file once.
 */
export class DocumentSink implements Sink {
  readonly description: string;
  private readonly buffer = new Map<string, ScrapedRecord>();

  constructor(
    private readonly filePath: string,
    private readonly format: DocumentFormat = formatFromPath(filePath),
    private readonly keyOf: RecordKeyFn = bySourceUrl
  ) {
    this.description = `${format}:${filePath}`;
  }

  async open(): Promise<void> {
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    // location must be writable before the crawl starts
    fs.accessSync(path.dirname(path.resolve(this.filePath)), fs.constants.W_OK);
  }

  async insert(record: ScrapedRecord): Promise<void> {
    this.buffer.set(this.keyOf(record), record);
  }

  async close(): Promise<void> {
    const records = [...this.buffer.values()];
    const content = this.format === "csv" ? recordsToCsv(records) : recordsToJson(records);
    fs.writeFileSync(this.filePath, content, "utf-8");
  }

  get pending(): number {
    return this.buffer.size;
  }
}

export function formatFromPath(filePath: string): DocumentFormat {
  return path.extname(filePath).toLowerCase() === ".csv" ? "csv" : "json";
}
