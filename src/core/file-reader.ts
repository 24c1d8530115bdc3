import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { ConfigError } from "./errors";

const SUPPORTED_EXTENSIONS = new Set([".csv", ".xlsx", ".xls"]);
const URL_HEADERS = ["url", "loc", "link", "href", "address", "uri"];
const CATEGORY_HEADERS = ["category", "section", "group"];

/** One detail URL from a seed file, with its category when the file has one */
export interface SeedRow {
  url: string;
  category?: string;
}

/**
 * Read detail URLs from a CSV or XLSX file. The first row holds headers;
 * rows whose URL cell is not an http(s) URL are skipped.
 * @param urlHeader  Header of the URL column; detected when omitted.
 */
export function readSeedFile(filePath: string, urlHeader?: string): SeedRow[] {
  const table = readTable(filePath);
  const [headers, ...body] = table;
  if (!headers) {
    throw new ConfigError(`File "${filePath}" is empty.`);
  }

  const urlCol = urlHeader ? requireColumn(headers, urlHeader) : detectUrlColumn(headers);
  const categoryCol = columnOf(headers, CATEGORY_HEADERS);

  return body.flatMap((cells): SeedRow[] => {
    const url = cellAt(cells, urlCol);
    if (!isHttpUrl(url)) return [];
    const category = categoryCol === -1 ? "" : cellAt(cells, categoryCol);
    return [category ? { url, category } : { url }];
  });
}

// ── Internals ────────────────────────────────────────────────────────────────

/** First sheet as rows of trimmed strings. CSV goes through the same reader, unparsed. */
function readTable(filePath: string): string[][] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Input file "${filePath}" does not exist.`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new ConfigError(
      `Unsupported file type "${ext}". Only .csv and .xlsx/.xls are supported.`
    );
  }
  if (fs.statSync(filePath).size === 0) return [];

  const workbook = XLSX.readFile(filePath, { raw: ext === ".csv" });
  const first = workbook.SheetNames[0];
  const sheet = first === undefined ? undefined : workbook.Sheets[first];
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    blankrows: false,
  });
  return rows.map((row) => (Array.isArray(row) ? row.map((cell) => String(cell ?? "").trim()) : []));
}

function cellAt(cells: string[], index: number): string {
  return cells[index] ?? "";
}

function columnOf(headers: string[], candidates: string[]): number {
  const normalized = headers.map((h) => h.trim().toLowerCase());
  for (const name of candidates) {
    const idx = normalized.indexOf(name);
    if (idx !== -1) return idx;
  }
  return -1;
}

function listHeaders(headers: string[]): string {
  return headers.map((h) => `"${h}"`).join(", ");
}

function requireColumn(headers: string[], wanted: string): number {
  const idx = columnOf(headers, [wanted.trim().toLowerCase()]);
  if (idx === -1) {
    throw new ConfigError(`Column "${wanted}" not found. Available headers: ${listHeaders(headers)}`);
  }
  return idx;
}

function detectUrlColumn(headers: string[]): number {
  const idx = columnOf(headers, URL_HEADERS);
  if (idx === -1) {
    throw new ConfigError(
      `No URL column found. Headers present: ${listHeaders(headers)}. ` +
        `Pass --column=<name> to choose one.`
    );
  }
  return idx;
}

function isHttpUrl(value: string): boolean {
  if (!/^https?:\/\//i.test(value)) return false;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
