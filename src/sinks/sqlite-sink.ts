import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { RecordFields, ScrapedRecord } from "../types";
import { RecordRejectedError } from "../core/errors";
import { RecordKeyFn, Sink, bySourceUrl } from "./types";

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface RecordRow {
  record_key: string;
  source_url: string;
  scraped_at: string;
  fields: string;
}

function isRecordRow(row: unknown): row is RecordRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "record_key" in row &&
    "source_url" in row &&
    "scraped_at" in row &&
    "fields" in row &&
    typeof row.fields === "string"
  );
}

function isConstraintError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("SQLITE_CONSTRAINT")
  );
}

/**
 * SQLite table keyed by the record's natural key. Inserts are upserts,
 * so re-running a crawl refreshes rows instead of duplicating them.
 */
export class SqliteSink implements Sink {
  readonly description: string;
  private db: Database.Database | null = null;
  private upsert: Database.Statement<[string, string, string, string]> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly keyOf: RecordKeyFn = bySourceUrl,
    private readonly table = "records"
  ) {
    if (!TABLE_NAME.test(table)) {
      throw new Error(`Invalid table name "${table}"`);
    }
    this.description = `sqlite:${filePath}`;
  }

  async open(): Promise<void> {
    if (this.db) return;
    if (this.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    }
    const db = new Database(this.filePath);
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        record_key TEXT PRIMARY KEY,
        source_url TEXT NOT NULL,
        scraped_at TEXT NOT NULL,
        fields TEXT NOT NULL
      )
    `);
    this.upsert = db.prepare<[string, string, string, string]>(`
      INSERT INTO ${this.table} (record_key, source_url, scraped_at, fields)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(record_key) DO UPDATE SET
        source_url = excluded.source_url,
        scraped_at = excluded.scraped_at,
        fields = excluded.fields
    `);
    this.db = db;
  }

  async insert(record: ScrapedRecord): Promise<void> {
    if (!this.upsert) throw new Error(`${this.description} is not open`);

    const key = this.keyOf(record);
    if (!key) throw new RecordRejectedError("empty record key");

    let fields: string;
    try {
      fields = JSON.stringify(record.fields);
    } catch (err) {
      throw new RecordRejectedError("fields are not serializable", { cause: err });
    }

    try {
      this.upsert.run(key, record.sourceUrl, record.scrapedAt, fields);
    } catch (err) {
      if (isConstraintError(err)) {
        throw new RecordRejectedError(`constraint violated for ${key}`, { cause: err });
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    this.upsert = null;
    this.db?.close();
    this.db = null;
  }

  /** All stored records, ordered by key. The sink must be open. */
  rows(): Array<ScrapedRecord & { key: string }> {
    if (!this.db) throw new Error(`${this.description} is not open`);
    const rows = this.db
      .prepare(`SELECT record_key, source_url, scraped_at, fields FROM ${this.table} ORDER BY record_key`)
      .all();
    return rows.filter(isRecordRow).map((row) => ({
      key: String(row.record_key),
      sourceUrl: String(row.source_url),
      scrapedAt: String(row.scraped_at),
      fields: parseFields(row.fields),
    }));
  }
}

function parseFields(json: string): RecordFields {
  const value: unknown = JSON.parse(json);
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? { ...value }
    : {};
}
