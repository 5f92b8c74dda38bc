export interface PoolOptions {
  /** Units of work in flight at once. Default: 4 */
  concurrency?: number;
  /** Checked before every unit; an aborted signal stops the map with its reason. */
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Runs `worker` over every item with bounded concurrency and returns the
 * results in input order. The first rejection fails the whole map once its
 * batch has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {}
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  const results = new Array<R>(items.length);
  let completed = 0;

  for (let i = 0; i < items.length; i += concurrency) {
    options.signal?.throwIfAborted();

    const batch = items.slice(i, i + concurrency);
    const settled = await Promise.allSettled(
      batch.map(async (item, batchIndex) => {
        options.signal?.throwIfAborted();
        const globalIndex = i + batchIndex;
        results[globalIndex] = await worker(item, globalIndex);
        completed++;
        options.onProgress?.(completed, items.length);
      })
    );

    const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (rejected) {
      throw rejected.reason;
    }

    // Yield between batches so cancellation and other requests get a turn
    if (i + concurrency < items.length) {
      await new Promise((resolve) => setImmediate(resolve));
    }
  }

  return results;
}
