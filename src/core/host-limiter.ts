/**
 * Caps concurrent work per hostname so a large worker pool does not
 * pile onto a single host.
 */
export class HostLimiter {
  private readonly active = new Map<string, number>();
  private readonly waiting = new Map<string, Array<() => void>>();

  constructor(readonly maxPerHost: number) {
    if (!Number.isInteger(maxPerHost) || maxPerHost < 1) {
      throw new RangeError(`maxPerHost must be a positive integer, got ${maxPerHost}`);
    }
  }

  /** Run `fn` once a slot for the URL's host is free. */
  async run<T>(url: string, fn: () => Promise<T>): Promise<T> {
    const host = hostOf(url);
    await this.acquire(host);
    try {
      return await fn();
    } finally {
      this.release(host);
    }
  }

  inFlight(host: string): number {
    return this.active.get(host) ?? 0;
  }

  private acquire(host: string): Promise<void> {
    const current = this.active.get(host) ?? 0;
    if (current < this.maxPerHost) {
      this.active.set(host, current + 1);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const queue = this.waiting.get(host) ?? [];
      queue.push(resolve);
      this.waiting.set(host, queue);
    });
  }

  private release(host: string): void {
    const queue = this.waiting.get(host);
    const next = queue?.shift();
    if (next) {
      // slot passes straight to the next waiter
      if (queue?.length === 0) this.waiting.delete(host);
      next();
      return;
    }
    const current = (this.active.get(host) ?? 1) - 1;
    if (current <= 0) this.active.delete(host);
    else this.active.set(host, current);
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}
