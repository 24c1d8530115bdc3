import * as path from "path";
import { DocumentSink } from "./document-sink";
import { SqliteSink } from "./sqlite-sink";
import { RecordKeyFn, Sink } from "./types";

const SQLITE_EXTENSIONS = new Set([".db", ".sqlite", ".sqlite3"]);

/**
 * Pick the sink for an output location by extension:
 * .db/.sqlite/.sqlite3 -> SQLite, .csv -> CSV document, anything else -> JSON.
 */
export function createSink(output: string, keyOf: RecordKeyFn): Sink {
  const ext = path.extname(output).toLowerCase();
  if (SQLITE_EXTENSIONS.has(ext)) return new SqliteSink(output, keyOf);
  return new DocumentSink(output, ext === ".csv" ? "csv" : "json", keyOf);
}

export { DocumentSink, SqliteSink };
export { MemorySink } from "./memory-sink";
export type { RecordKeyFn, Sink } from "./types";
