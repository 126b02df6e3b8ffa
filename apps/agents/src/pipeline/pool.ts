import { defaultSleep, type Sleep } from "./retry";

export type PoolOptions = {
  concurrency: number;
  /** Pause a worker takes between two calls. */
  delayMs: number;
  sleep?: Sleep;
  signal?: AbortSignal;
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items` regardless of completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, position: number) => Promise<R>,
  options: PoolOptions
): Promise<R[]> {
  const sleep = options.sleep ?? defaultSleep;
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;

  const lane = async () => {
    let first = true;
    while (cursor < items.length) {
      const position = cursor;
      cursor += 1;

      options.signal?.throwIfAborted();
      if (!first && options.delayMs > 0) {
        await sleep(options.delayMs, options.signal);
      }
      first = false;
      results[position] = await worker(items[position], position);
    }
  };

  const lanes = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
