import axios, { AxiosError, AxiosInstance } from "axios";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/18.0 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:133.0) Gecko/20100101 Firefox/133.0",
];

/**
 * Pick a random User-Agent string from the rotation pool.
 */
function randomUA(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/**
 * Create a configured axios instance with realistic browser headers.
 * Every status code resolves: the fetcher decides what is retryable.
 * @param timeout - Request timeout in milliseconds
 */
export function createHttpClient(timeout: number): AxiosInstance {
  const client = axios.create({
    timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
    },
    maxRedirects: 5,
    responseType: "text",
    validateStatus: () => true,
  });

  // Rotate User-Agent on every request
  client.interceptors.request.use((config) => {
    config.headers["User-Agent"] = randomUA();
    return config;
  });

  return client;
}

/**
 * Canonical form used for dedup: no fragment, no trailing slash.
 */
export function normalizeUrl(url: string): string {
  return url.replace(/#.*$/, "").replace(/\/$/, "");
}

/**
 * Resolve a possibly relative href against the page it was found on.
 * Returns null for empty or malformed hrefs.
 */
export function toAbsoluteUrl(href: string | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, pageUrl).href;
  } catch {
    return null;
  }
}

/** Collapse runs of whitespace and trim. */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

/** Short descriptions for transport error codes axios surfaces */
const NETWORK_ERRORS: Record<string, string> = {
  ENOTFOUND: "DNS lookup failed",
  EAI_AGAIN: "DNS lookup failed",
  ECONNRESET: "Connection reset by server",
  ECONNREFUSED: "Connection refused",
  ERR_TLS_CERT_ALTNAME_INVALID: "TLS certificate error",
  CERT_HAS_EXPIRED: "TLS certificate error",
};

/**
 * Human-readable message for anything caught. Axios errors are described
 * by their transport code, so log lines stay short.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (isTimeoutError(err)) return "Request timed out";
    const known = err.code ? NETWORK_ERRORS[err.code] : undefined;
    if (known) return err.config?.url ? `${known}: ${err.config.url}` : known;
    if (err.response) return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Whether a thrown loader error means the request ran out of time. */
export function isTimeoutError(err: unknown): boolean {
  if (err instanceof AxiosError) return TIMEOUT_CODES.has(err.code ?? "");
  return err instanceof Error && err.name === "TimeoutError";
}

/** "45s", "2m 30s" or "1h 5m" */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}
