import { ScrapedRecord } from "../types";
import { Sink } from "../sinks/types";
import { Clock, systemClock } from "./clock";
import { PersistFailure, RecordRejectedError } from "./errors";
import { Logger, silentLogger } from "./logger";
import { BoundedQueue } from "./queue";
import { StatsAccumulator } from "./stats";
import { getErrorMessage } from "./utils";

export interface WriterOptions {
  sink: Sink;
  queue: BoundedQueue<ScrapedRecord>;
  stats: StatsAccumulator;
  /** Insert attempts per record before the sink is declared unreachable */
  maxAttempts?: number;
  baseDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export type WriterResult =
  | { ok: true; written: number }
  | { ok: false; written: number; error: PersistFailure };

/**
 * The only code that touches the sink. Drains the result queue one record
 * at a time; retries a failing insert, then escalates.
 */
export class PersistenceWriter {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private written = 0;

  constructor(private readonly options: WriterOptions) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves once the queue is closed and drained, or on the first fatal
   * sink error. On a fatal error the queue is closed so producers blocked
   * on it are released.
   */
  async run(): Promise<WriterResult> {
    const { queue } = this.options;
    for (;;) {
      const record = await queue.pop();
      if (record === undefined) return { ok: true, written: this.written };

      const failure = await this.write(record);
      if (failure) {
        queue.close();
        const dropped = queue.drain().length;
        if (dropped > 0) this.logger.warn(`${dropped} record(s) left unwritten`);
        return { ok: false, written: this.written, error: failure };
      }
    }
  }

  /** Insert with bounded retry. Returns the fatal error, if any. */
  private async write(record: ScrapedRecord): Promise<PersistFailure | null> {
    const { sink, stats } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await sink.insert(record);
        this.written++;
        stats.increment("recordsWritten");
        return null;
      } catch (err) {
        if (err instanceof RecordRejectedError) {
          stats.increment("writeFailures");
          this.logger.warn(`record from ${record.sourceUrl} rejected: ${err.message}`);
          return null;
        }
        lastError = err;
        this.logger.warn(
          `insert ${attempt}/${this.maxAttempts} for ${record.sourceUrl} failed: ${getErrorMessage(err)}`
        );
        if (attempt < this.maxAttempts) {
          await this.clock.sleep(this.baseDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    stats.increment("writeFailures");
    return new PersistFailure(
      `sink unreachable after ${this.maxAttempts} attempts: ${getErrorMessage(lastError)}`,
      this.written,
      { cause: lastError }
    );
  }
}
