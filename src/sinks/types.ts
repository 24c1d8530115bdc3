import { ScrapedRecord } from "../types";

/**
 * Durable destination for records. Only the persistence writer calls
 * `insert`, so implementations need no locking. Inserting the same key
 * twice must not create a second record.
 */
export interface Sink {
  readonly description: string;
  open(): Promise<void>;
  insert(record: ScrapedRecord): Promise<void>;
  close(): Promise<void>;
}

export type RecordKeyFn = (record: ScrapedRecord) => string;

export const bySourceUrl: RecordKeyFn = (record) => record.sourceUrl;
