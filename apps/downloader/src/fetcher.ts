// apps/downloader/src/fetcher.ts
import { dataTypeSpec } from "./dataTypes.js";
import { FetchError, RateLimitedError, TimeoutError, isRetryable } from "./errors.js";
import type { MarketDataClient, PageRequest } from "./exchange/client.js";
import { log } from "./logger.js";
import { dedup, normalize } from "./normalize.js";
import type { RateLimiter } from "./rateLimiter.js";
import { DEFAULT_RETRY, withRetry, type RetryDecision, type RetryOptions, type Sleep } from "./retry.js";
import { isoUtc } from "./time.js";
import type { DataType, MarketRecord, Window } from "./types.js";

export type FetcherOptions = {
  pageTimeoutMs?: number;
  retry?: Partial<RetryOptions>;
  /** override the data type's page limit (mostly for tests) */
  pageLimit?: number;
  sleep?: Sleep;
};

export const DEFAULT_PAGE_TIMEOUT_MS = 15_000;

function retryDecision(limiter: RateLimiter) {
  return (e: unknown): RetryDecision => {
    if (!isRetryable(e)) return { retry: false };
    if (e instanceof RateLimitedError) {
      if (e.retryAfterMs != null) limiter.penalize(e.retryAfterMs);
      return { retry: true, waitMs: e.retryAfterMs, reason: "rate_limited" };
    }
    return { retry: true, reason: e instanceof Error ? e.message : String(e) };
  };
}

/**
 * Pages one window out of the remote API. Every page request takes a token
 * from the shared limiter, carries its own timeout and is retried on
 * rate-limit / network / timeout failures.
 */
export class RateLimitedFetcher {
  private readonly pageTimeoutMs: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly client: MarketDataClient,
    private readonly limiter: RateLimiter,
    private readonly opts: FetcherOptions = {}
  ) {
    this.pageTimeoutMs = opts.pageTimeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY, ...opts.retry };
  }

  async fetchWindow(
    exchange: string,
    dataType: DataType,
    subTypeId: string,
    symbol: string,
    window: Window
  ): Promise<MarketRecord[]> {
    const spec = dataTypeSpec(dataType);
    const clientMax = this.client.pageLimit?.(dataType);
    const collected: MarketRecord[] = [];
    let cursor = window.start;
    let pages = 0;

    while (cursor < window.end) {
      const limit = Math.min(
        this.opts.pageLimit ?? spec.pageLimit,
        spec.limitFor(subTypeId, cursor, window.end),
        clientMax ?? Number.POSITIVE_INFINITY
      );
      const req: PageRequest = { exchange, dataType, subTypeId, symbol, since: cursor, limit };

      let raw: unknown[];
      try {
        raw = await this.fetchPage(req);
      } catch (e) {
        throw new FetchError(symbol, window, e);
      }
      pages += 1;

      if (raw.length === 0) {
        const next = spec.advanceOnEmpty(subTypeId, cursor, limit);
        if (next <= cursor) break;
        cursor = next;
        continue;
      }

      const page = normalize(dataType, raw, symbol);
      for (const r of page) {
        if (r.timestamp >= window.start && r.timestamp < window.end) collected.push(r);
      }

      const last = page[page.length - 1];
      if (!last) {
        // nothing usable in a non-empty page; treat like a gap
        const next = spec.advanceOnEmpty(subTypeId, cursor, limit);
        if (next <= cursor) break;
        cursor = next;
        continue;
      }

      if (last.timestamp >= window.end) break;
      if (clientMax !== undefined && raw.length < limit) break;

      const next = spec.nextCursor(subTypeId, last.timestamp, cursor);
      if (next <= cursor) {
        log.warn(`[fetch] cursor stalled, stopping`, { symbol, dataType, subTypeId, cursor: isoUtc(cursor) });
        break;
      }
      cursor = next;
    }

    log.debug(`[fetch] window done`, { symbol, dataType, subTypeId, partition: window.partitionKey, pages, rows: collected.length });
    return dedup(dataType, [], collected);
  }

  private fetchPage(req: PageRequest): Promise<unknown[]> {
    const label = `${req.exchange}:${req.dataType}:${req.subTypeId}:${req.symbol}@${isoUtc(req.since)}`;
    return withRetry(
      async () => {
        await this.limiter.acquire();
        return this.requestWithTimeout(req, label);
      },
      retryDecision(this.limiter),
      { ...this.retry, label, sleep: this.opts.sleep }
    );
  }

  private async requestWithTimeout(req: PageRequest, label: string): Promise<unknown[]> {
    const ac = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        ac.abort();
        reject(new TimeoutError(this.pageTimeoutMs, label));
      }, this.pageTimeoutMs);
    });

    try {
      return await Promise.race([this.client.fetchPage(req, { signal: ac.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
