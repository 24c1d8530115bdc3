import { BoundedQueue } from "./queue";
import { Logger, silentLogger } from "./logger";
import { getErrorMessage } from "./utils";

export interface WorkerPoolOptions<T> {
  concurrency: number;
  logger?: Logger;
  /** Checked before every dequeue; a stopped pool leaves the rest queued. */
  signal?: AbortSignal;
  /** A handler threw. The worker keeps going. */
  onHandlerError?: (item: T, err: unknown) => void;
}

/**
 * Run `concurrency` workers over `queue` until it is closed and empty.
 * Items are processed once each; a handler error never stops its worker.
 * @returns Number of items handled
 */
export async function runWorkerPool<T>(
  queue: BoundedQueue<T>,
  options: WorkerPoolOptions<T>,
  handler: (item: T, workerId: number) => Promise<void>
): Promise<number> {
  const { concurrency, signal } = options;
  const logger = options.logger ?? silentLogger;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${concurrency}`);
  }

  let handled = 0;

  const worker = async (workerId: number): Promise<void> => {
    while (!signal?.aborted) {
      const item = await queue.pop();
      if (item === undefined) return;
      try {
        await handler(item, workerId);
      } catch (err) {
        logger.error(`worker ${workerId}: ${getErrorMessage(err)}`);
        options.onHandlerError?.(item, err);
      }
      handled++;
    }
  };

  await Promise.all(
    Array.from({ length: concurrency }, (_, i) => worker(i + 1))
  );
  return handled;
}
