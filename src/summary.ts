import * as fs from "fs";
import * as path from "path";
import { PipelineReport } from "./types";
import { CrawlConfig } from "./config";
import { formatDuration } from "./core/utils";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
function timestampedPath(outputDir: string, base: string, ext: string, at: Date): string {
  const ts = at
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}

/** Statistics written next to the output after every run */
export interface RunSummary {
  site: string;
  base_url: string;
  categories: string[];
  output: string;
  outcome: PipelineReport["outcome"];
  reason: string | null;
  attempted: number;
  succeeded: number;
  failed: number;
  records_written: number;
  success_rate: string;
  elapsed_time: string;
  started_at: string;
  finished_at: string;
  stats: PipelineReport["stats"];
}

export function buildSummary(report: PipelineReport, config: CrawlConfig): RunSummary {
  const { stats } = report;
  const successRate =
    stats.attempted > 0
      ? ((stats.succeeded / stats.attempted) * 100).toFixed(1) + "%"
      : "0%";
  return {
    site: config.site,
    base_url: config.baseUrl,
    categories: config.categories,
    output: config.output,
    outcome: report.outcome,
    reason: report.reason ?? null,
    attempted: stats.attempted,
    succeeded: stats.succeeded,
    failed: stats.failed,
    records_written: stats.recordsWritten,
    success_rate: successRate,
    elapsed_time: formatDuration(report.elapsedMs),
    started_at: report.startedAt,
    finished_at: report.finishedAt,
    stats,
  };
}

/**
 * Write run statistics to summary_<timestamp>.json in `outputDir`.
 * @returns Path of the written file
 */
export function exportSummary(summary: RunSummary, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json", new Date(summary.finished_at));
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
