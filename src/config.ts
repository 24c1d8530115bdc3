import * as fs from "fs";
import * as path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./core/errors";
import { LogLevel } from "./core/logger";
import { getSite, siteNames } from "./sites";

/** Fully resolved settings for one crawl run */
export interface CrawlConfig {
  site: string;
  baseUrl: string;
  categories: string[];
  output: string;
  workers: number;
  queueCapacity: number;
  perHostConcurrency: number;
  maxAttempts: number;
  timeout: number;
  maxPages: number;
  strategy: "eager" | "lazy";
  sitemapUrl: string | null;
  inputFile: string | null;
  urlColumn: string | null;
  filter: RegExp | null;
  logLevel: LogLevel;
}

/** CLI flag -> environment variable it overrides */
const FLAG_TO_ENV = new Map<string, string>([
  ["site", "SITE"],
  ["url", "BASE_URL"],
  ["categories", "CATEGORIES"],
  ["output", "OUTPUT"],
  ["concurrency", "WORKERS"],
  ["workers", "WORKERS"],
  ["queue", "QUEUE_CAPACITY"],
  ["per-host", "PER_HOST_CONCURRENCY"],
  ["retries", "MAX_ATTEMPTS"],
  ["timeout", "TIMEOUT_MS"],
  ["max-pages", "MAX_PAGES"],
  ["strategy", "DISCOVERY"],
  ["sitemap", "SITEMAP_URL"],
  ["input", "INPUT_FILE"],
  ["column", "URL_COLUMN"],
  ["filter", "FILTER"],
  ["log-level", "LOG_LEVEL"],
]);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const envSchema = z.object({
  SITE: z.string().trim().default("catalogue"),
  BASE_URL: optionalString,
  CATEGORIES: optionalString,
  OUTPUT: z.string().trim().min(1).default("output/records.json"),
  WORKERS: positiveInt(5),
  QUEUE_CAPACITY: z.coerce.number().int().positive().optional(),
  PER_HOST_CONCURRENCY: z.coerce.number().int().positive().optional(),
  MAX_ATTEMPTS: positiveInt(3),
  TIMEOUT_MS: positiveInt(15_000),
  MAX_PAGES: positiveInt(50),
  DISCOVERY: z.enum(["eager", "lazy"]).default("lazy"),
  SITEMAP_URL: optionalString,
  INPUT_FILE: optionalString,
  URL_COLUMN: optionalString,
  FILTER: optionalString,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Parse `--key=value` arguments into environment-style overrides.
 * Unknown flags are an error.
 */
export function parseArgs(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const arg of argv) {
    const eqIdx = arg.indexOf("=");
    if (!arg.startsWith("--") || eqIdx === -1) {
      throw new ConfigError(`Unrecognised argument "${arg}". Use --key=value.`);
    }
    const key = arg.slice(2, eqIdx);
    const envName = FLAG_TO_ENV.get(key);
    if (!envName) {
      throw new ConfigError(
        `Unknown option --${key}. Known: ${[...FLAG_TO_ENV.keys()].map((k) => `--${k}`).join(", ")}`
      );
    }
    overrides[envName] = arg.slice(eqIdx + 1);
  }
  return overrides;
}

/**
 * Load `.env` (or ENV_FILE) from the working directory into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(cwd = process.cwd()): string | null {
  const envFile = process.env.ENV_FILE ?? ".env";
  const envPath = path.resolve(cwd, envFile);
  if (!fs.existsSync(envPath)) return null;
  dotenv.config({ path: envPath });
  return envPath;
}

/**
 * Resolve the run configuration: CLI flags over environment variables
 * over defaults.
 */
export function resolveConfig(
  env: Record<string, string | undefined>,
  argv: string[] = []
): CrawlConfig {
  const parsed = envSchema.safeParse({ ...env, ...parseArgs(argv) });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  const site = getSite(e.SITE);
  if (!site) {
    throw new ConfigError(`Unknown site "${e.SITE}". Available: ${siteNames().join(", ")}`);
  }

  const baseUrl = e.BASE_URL ?? site.defaultBaseUrl;
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`BASE_URL "${baseUrl}" is not a valid URL`);
  }

  let filter: RegExp | null = null;
  if (e.FILTER) {
    try {
      filter = new RegExp(e.FILTER);
    } catch {
      throw new ConfigError(`FILTER "${e.FILTER}" is not a valid regular expression`);
    }
  }

  const categories = e.CATEGORIES
    ? e.CATEGORIES.split(",").map((c) => c.trim()).filter(Boolean)
    : site.defaultCategories;

  return {
    site: site.name,
    baseUrl,
    categories,
    output: e.OUTPUT,
    workers: e.WORKERS,
    queueCapacity: e.QUEUE_CAPACITY ?? e.WORKERS * 2,
    perHostConcurrency: e.PER_HOST_CONCURRENCY ?? e.WORKERS,
    maxAttempts: e.MAX_ATTEMPTS,
    timeout: e.TIMEOUT_MS,
    maxPages: e.MAX_PAGES,
    strategy: e.DISCOVERY,
    sitemapUrl: e.SITEMAP_URL,
    inputFile: e.INPUT_FILE,
    urlColumn: e.URL_COLUMN,
    filter,
    logLevel: e.LOG_LEVEL,
  };
}
