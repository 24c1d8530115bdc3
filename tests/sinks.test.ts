import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { RecordRejectedError } from "../src/core/errors";
import { DocumentSink, MemorySink, SqliteSink, createSink } from "../src/sinks";
import { escapeCsv, recordsToCsv, recordsToJson } from "../src/sinks/document-sink";
import { makePipeline, record, shopRoutes } from "./helpers";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "paged-crawler-sinks-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("SqliteSink", () => {
  it("upserts by key and keeps rows across reopen", async () => {
    const file = path.join(dir, "nested", "records.db");
    const sink = new SqliteSink(file);
    await sink.open();
    await sink.insert(record("https://shop.test/p/1", { title: "Alpha" }));
    await sink.insert(record("https://shop.test/p/2", { title: "Beta", tags: ["x", "y"] }));
    await sink.insert(record("https://shop.test/p/1", { title: "Alpha (2nd ed.)" }));
    await sink.close();

    const reopened = new SqliteSink(file);
    await reopened.open();
    expect(reopened.rows()).toEqual([
      {
        key: "https://shop.test/p/1",
        sourceUrl: "https://shop.test/p/1",
        scrapedAt: "2026-01-01T00:00:00.000Z",
        fields: { title: "Alpha (2nd ed.)" },
      },
      {
        key: "https://shop.test/p/2",
        sourceUrl: "https://shop.test/p/2",
        scrapedAt: "2026-01-01T00:00:00.000Z",
        fields: { title: "Beta", tags: ["x", "y"] },
      },
    ]);
    await reopened.close();
  });

  it("rejects a record it can never store", async () => {
    const sink = new SqliteSink(":memory:", () => "");
    await sink.open();
    await expect(sink.insert(record("https://shop.test/p/1"))).rejects.toBeInstanceOf(RecordRejectedError);

    const byUrl = new SqliteSink(":memory:");
    await byUrl.open();
    await expect(byUrl.insert(record("https://shop.test/p/1", { size: 10n }))).rejects.toThrow(
      "fields are not serializable"
    );
    await sink.close();
    await byUrl.close();
  });

  it("refuses inserts before open and bad table names", async () => {
    await expect(new SqliteSink(":memory:").insert(record("https://shop.test/p/1"))).rejects.toThrow(
      "sqlite::memory: is not open"
    );
    expect(() => new SqliteSink(":memory:", undefined, "records; DROP")).toThrow(
      'Invalid table name "records; DROP"'
    );
  });

  it("holds the same rows after the same crawl runs twice", async () => {
    const file = path.join(dir, "crawl.db");

    for (let run = 0; run < 2; run++) {
      const report = await makePipeline(shopRoutes(), { sink: new SqliteSink(file) }).pipeline.run();
      expect(report.outcome).toBe("done");
      expect(report.stats.recordsWritten).toBe(3);
    }

    const sink = new SqliteSink(file);
    await sink.open();
    expect(sink.rows().map((r) => [r.key, r.fields["title"]])).toEqual([
      ["https://shop.test/p/1", "Alpha"],
      ["https://shop.test/p/2", "Beta"],
      ["https://shop.test/p/3", "Gamma"],
    ]);
    await sink.close();
  });
});

describe("MemorySink", () => {
  it("refuses inserts until opened", async () => {
    const sink = new MemorySink();
    await expect(sink.insert(record("https://shop.test/p/1"))).rejects.toThrow("sink is not open");
  });
});

describe("document rendering", () => {
  it("escapes CSV cells only when needed", () => {
    expect(escapeCsv("plain")).toBe("plain");
    expect(escapeCsv(3)).toBe("3");
    expect(escapeCsv(null)).toBe("");
    expect(escapeCsv("a\nb")).toBe('"a\nb"');
  });

  it("renders CSV with sorted field columns followed by provenance", () => {
    const csv = recordsToCsv([
      record("https://shop.test/p/1", { title: "Alpha, Deluxe", tags: ["a", "b"], info: { UPC: "x" } }),
      record("https://shop.test/p/2", { title: 'Say "hi"' }),
    ]);

    expect(csv).toBe(
      "\uFEFFinfo,tags,title,source_url,scraped_at\n" +
        '"{""UPC"":""x""}",a|b,"Alpha, Deluxe",https://shop.test/p/1,2026-01-01T00:00:00.000Z\n' +
        ',,"Say ""hi""",https://shop.test/p/2,2026-01-01T00:00:00.000Z\n'
    );
  });

  it("renders JSON as flat objects", () => {
    expect(recordsToJson([record("https://shop.test/p/1", { title: "Alpha" })])).toBe(
      [
        "[",
        "  {",
        '    "title": "Alpha",',
        '    "source_url": "https://shop.test/p/1",',
        '    "scraped_at": "2026-01-01T00:00:00.000Z"',
        "  }",
        "]",
        "",
      ].join("\n")
    );
  });
});

describe("DocumentSink", () => {
  it("writes each key once when it closes", async () => {
    const file = path.join(dir, "out", "records.csv");
    const sink = new DocumentSink(file);
    await sink.open();
    await sink.insert(record("https://shop.test/p/1", { title: "Alpha" }));
    await sink.insert(record("https://shop.test/p/1", { title: "Alpha again" }));
    expect(sink.pending).toBe(1);
    expect(fs.existsSync(file)).toBe(false);

    await sink.close();

    expect(fs.readFileSync(file, "utf-8")).toBe(
      "\uFEFFtitle,source_url,scraped_at\n" +
        "Alpha again,https://shop.test/p/1,2026-01-01T00:00:00.000Z\n"
    );
  });
});

describe("createSink", () => {
  it.each([
    ["records.db", "sqlite:records.db"],
    ["records.sqlite3", "sqlite:records.sqlite3"],
    ["records.CSV", "csv:records.CSV"],
    ["records.json", "json:records.json"],
    ["records", "json:records"],
  ])("picks the sink for %s", (output, description) => {
    expect(createSink(output, (r) => r.sourceUrl).description).toBe(description);
  });
});
