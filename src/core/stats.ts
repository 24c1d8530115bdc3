import { PipelineStats } from "../types";

type Counter = keyof PipelineStats;

export function emptyStats(): PipelineStats {
  return {
    attempted: 0,
    succeeded: 0,
    failed: 0,
    recordsWritten: 0,
    retries: 0,
    parseFailures: 0,
    writeFailures: 0,
    pagesVisited: 0,
    discovered: 0,
    duplicatesSkipped: 0,
    abandoned: 0,
  };
}

/**
 * The run's only mutable counters. Owned by the pipeline and handed to
 * the worker pool, discoverer and writer; everyone else reads snapshots.
 */
export class StatsAccumulator {
  private readonly counters = emptyStats();
  private frozen = false;

  increment(counter: Counter, by = 1): void {
    if (this.frozen) return;
    this.counters[counter] += by;
  }

  get(counter: Counter): number {
    return this.counters[counter];
  }

  snapshot(): Readonly<PipelineStats> {
    return Object.freeze({ ...this.counters });
  }

  /** Called once the run ends; later increments are ignored. */
  finalize(): Readonly<PipelineStats> {
    this.frozen = true;
    return this.snapshot();
  }
}
