import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, it, expect } from "vitest";
import { resolveConfig } from "../src/config";
import { buildSummary, exportSummary } from "../src/summary";
import { emptyStats } from "../src/core/stats";
import { PipelineReport } from "../src/types";

const report: PipelineReport = {
  outcome: "done",
  elapsedMs: 61_500,
  startedAt: "2026-01-01T00:00:00.000Z",
  finishedAt: "2026-01-01T00:01:01.500Z",
  stats: { ...emptyStats(), attempted: 5, succeeded: 4, failed: 1, recordsWritten: 3 },
};

describe("run summary", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("derives the success rate and elapsed time", () => {
    const summary = buildSummary(report, resolveConfig({ OUTPUT: "out/books.db" }));

    expect(summary).toMatchObject({
      site: "catalogue",
      output: "out/books.db",
      outcome: "done",
      reason: null,
      attempted: 5,
      records_written: 3,
      success_rate: "80.0%",
      elapsed_time: "1m 1s",
    });
  });

  it("writes a timestamped JSON file", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "paged-crawler-summary-"));
    const summary = buildSummary(report, resolveConfig({}));

    const filePath = exportSummary(summary, dir);

    expect(path.basename(filePath)).toBe("summary_20260101_000101.json");
    expect(JSON.parse(fs.readFileSync(filePath, "utf-8"))).toEqual(summary);
  });
});
