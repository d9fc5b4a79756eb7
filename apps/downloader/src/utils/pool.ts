// apps/downloader/src/utils/pool.ts

export type PoolCancel<T, R> = {
  signal: AbortSignal;
  /** result for an item that was never started because `signal` fired */
  onSkip: (item: T, index: number) => R;
};

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order. Once `cancel.signal` is aborted no further item is started.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  cancel?: PoolCancel<T, R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let idx = 0;

  async function worker() {
    while (true) {
      const cur = idx++;
      if (cur >= items.length) return;
      const item = items[cur];
      results[cur] = cancel?.signal.aborted ? cancel.onSkip(item, cur) : await fn(item, cur);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
