import { ScrapedRecord } from "../types";
import { RecordKeyFn, Sink, bySourceUrl } from "./types";

/**
 * Upserting in-process sink. Contents survive close/open, so one
 * instance can stand in for a database across several runs.
 */
export class MemorySink implements Sink {
  readonly description = "memory";
  private readonly rows = new Map<string, ScrapedRecord>();
  private isOpen = false;

  constructor(private readonly keyOf: RecordKeyFn = bySourceUrl) {}

  async open(): Promise<void> {
    this.isOpen = true;
  }

  async insert(record: ScrapedRecord): Promise<void> {
    if (!this.isOpen) throw new Error("sink is not open");
    this.rows.set(this.keyOf(record), record);
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  records(): ScrapedRecord[] {
    return [...this.rows.values()];
  }

  get size(): number {
    return this.rows.size;
  }
}
