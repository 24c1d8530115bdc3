#!/usr/bin/env node
import * as path from "path";
import { CrawlConfig, loadEnvFile, resolveConfig } from "./config";
import { ConfigError } from "./core/errors";
import { Fetcher, createAxiosLoader } from "./core/fetcher";
import { SeedRow, readSeedFile } from "./core/file-reader";
import { createConsoleLogger } from "./core/logger";
import { CrawlPipeline, exitCodeFor, formatReport } from "./core/pipeline";
import { createHttpClient, getErrorMessage } from "./core/utils";
import { getSite } from "./sites";
import { createSink } from "./sinks";
import { buildSummary, exportSummary } from "./summary";

async function main(): Promise<number> {
  const envPath = loadEnvFile();

  let config: CrawlConfig;
  let seedRows: SeedRow[] | undefined;
  try {
    config = resolveConfig(process.env, process.argv.slice(2));
    if (config.inputFile) {
      seedRows = readSeedFile(config.inputFile, config.urlColumn ?? undefined);
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const site = getSite(config.site);
  if (!site) {
    console.error(`Error: unknown site "${config.site}"`);
    return 2;
  }

  const logger = createConsoleLogger(config.logLevel);
  if (envPath) logger.debug(`Loaded environment from ${envPath}`);

  const source = seedRows
    ? `${seedRows.length} URL(s) from ${config.inputFile}`
    : config.sitemapUrl
      ? `sitemap ${config.sitemapUrl}`
      : `${config.categories.length} categor${config.categories.length === 1 ? "y" : "ies"} at ${config.baseUrl}`;
  logger.info(`Crawling ${site.name}: ${source}`);
  logger.info(
    `workers=${config.workers} queue=${config.queueCapacity} per-host=${config.perHostConcurrency} ` +
      `retries=${config.maxAttempts} strategy=${config.strategy} -> ${config.output}`
  );

  const fetcher = new Fetcher({
    loader: createAxiosLoader(createHttpClient(config.timeout)),
    policy: { maxAttempts: config.maxAttempts },
    logger,
  });
  const sink = createSink(config.output, (record) => site.recordKey(record));

  let completed = 0;
  const pipeline = new CrawlPipeline(
    {
      baseUrl: config.baseUrl,
      categories: config.categories,
      workers: config.workers,
      queueCapacity: config.queueCapacity,
      perHostConcurrency: config.perHostConcurrency,
      maxPages: config.maxPages,
      strategy: config.strategy,
      filter: config.filter,
      sitemapUrl: config.sitemapUrl ?? undefined,
      seedRows,
    },
    {
      site,
      fetcher,
      sink,
      logger,
      onTaskDone: (event) => {
        completed++;
        const icon = event.ok ? "+" : "x";
        const detail = event.error ? ` (${event.error})` : "";
        logger.info(`[${completed}]  ${icon} ${event.task.kind} ${event.task.url}${detail}`);
      },
    }
  );

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals++;
    if (signals > 1) {
      logger.error(`${signal} received again, exiting without draining`);
      process.exit(exitCodeFor("interrupted"));
    }
    const { attempted, recordsWritten } = pipeline.progress;
    logger.warn(`${signal}: finishing in-flight work (${attempted} attempted, ${recordsWritten} written so far)`);
    pipeline.shutdown(`${signal} received`);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const report = await pipeline.run();
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);

  const line = formatReport(report);
  if (report.outcome === "done") logger.info(line);
  else logger.error(line);

  try {
    const summaryPath = exportSummary(
      buildSummary(report, config),
      path.dirname(path.resolve(config.output))
    );
    logger.info(`Summary: ${summaryPath}`);
  } catch (err) {
    logger.warn(`Could not write summary: ${getErrorMessage(err)}`);
  }

  return exitCodeFor(report.outcome);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  }
);
