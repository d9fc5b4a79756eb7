// apps/downloader/tests/helpers.ts
import { NotFoundError } from "../src/errors.js";
import type { MarketDataClient, PageRequest } from "../src/exchange/client.js";
import { RateLimitedFetcher, type FetcherOptions } from "../src/fetcher.js";
import { NoopLimiter } from "../src/rateLimiter.js";
import { type PartitionStore, refLabel, statusOf } from "../src/store/PartitionStore.js";
import type {
  DataType,
  MarketRecord,
  PartitionHeader,
  PartitionRef,
  PartitionStatus,
  WriteMeta
} from "../src/types.js";

export const MIN = 60_000;
export const HOUR = 3_600_000;
export const DAY = 86_400_000;

// 2023-09-01T00:00:00Z
export const DAY0 = Date.UTC(2023, 8, 1);

export type PageSource = (req: PageRequest, signal?: AbortSignal) => unknown[] | Promise<unknown[]>;

/** MarketDataClient backed by a function; records every request. */
export class FakeClient implements MarketDataClient {
  readonly calls: PageRequest[] = [];
  /** set to undefined for a client that does not report its page cap */
  pageLimit: ((dataType: DataType) => number) | undefined = () => 1000;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly source: PageSource, private readonly symbols: string[] = []) {}

  async listSymbols(): Promise<string[]> {
    return this.symbols;
  }

  async fetchPage(req: PageRequest, opts: { signal?: AbortSignal } = {}): Promise<unknown[]> {
    this.calls.push(req);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.source(req, opts.signal);
    } finally {
      this.inFlight -= 1;
    }
  }
}

export function candleRow(ts: number, close = 1.5): unknown[] {
  return [ts, "1", "2", "0.5", String(close), "10", ts + MIN - 1];
}

/**
 * Exchange-like candle endpoint: candles every `tfMs` in [from, to()), the
 * first `limit` of them at or after `since`.
 */
export function candleServer(opts: {
  tfMs: number;
  from: number;
  to: () => number;
  close?: (symbol: string, ts: number) => number;
}): PageSource {
  return (req) => {
    const to = opts.to();
    const since = Math.max(req.since, opts.from);
    let ts = opts.from + Math.ceil((since - opts.from) / opts.tfMs) * opts.tfMs;
    const rows: unknown[] = [];
    while (ts < to && rows.length < req.limit) {
      rows.push(candleRow(ts, opts.close ? opts.close(req.symbol, ts) : 1.5));
      ts += opts.tfMs;
    }
    return rows;
  };
}

/** Rows of `rows` with timestamp >= since, first `limit` of them. */
export function listServer(rows: Array<{ timestamp: number }>): PageSource {
  return (req) => rows.filter((r) => r.timestamp >= req.since).slice(0, req.limit);
}

export function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export const noSleep = async (): Promise<void> => {};

export function makeFetcher(client: MarketDataClient, opts: FetcherOptions = {}): RateLimitedFetcher {
  return new RateLimitedFetcher(client, new NoopLimiter(), { sleep: noSleep, ...opts });
}

export function candle(symbol: string, timestamp: number, close = 1.5): MarketRecord {
  return { kind: "candle", timestamp, symbol, open: 1, high: 2, low: 0.5, close, volume: 10 };
}

/** PartitionStore kept in a Map. */
export class MemoryStore implements PartitionStore {
  readonly parts = new Map<string, { ref: PartitionRef; header: PartitionHeader; records: MarketRecord[] }>();
  writes = 0;

  constructor(private readonly clock: () => number = () => 0) {}

  async status(ref: PartitionRef): Promise<PartitionStatus> {
    return statusOf(await this.header(ref));
  }

  async header(ref: PartitionRef): Promise<PartitionHeader | null> {
    return this.parts.get(refLabel(ref))?.header ?? null;
  }

  async read(ref: PartitionRef): Promise<MarketRecord[]> {
    const p = this.parts.get(refLabel(ref));
    if (!p) throw new NotFoundError(ref);
    return [...p.records];
  }

  async write(ref: PartitionRef, records: readonly MarketRecord[], meta: WriteMeta): Promise<void> {
    this.writes += 1;
    this.parts.set(refLabel(ref), {
      ref,
      records: [...records],
      header: { ...ref, ...meta, writtenAt: this.clock(), recordCount: records.length }
    });
  }

  async listSymbols(exchange: string, dataType: DataType, subTypeId: string): Promise<string[]> {
    const out = new Set<string>();
    for (const { ref } of this.parts.values()) {
      if (ref.exchange === exchange && ref.dataType === dataType && ref.subTypeId === subTypeId) out.add(ref.symbol);
    }
    return [...out].sort();
  }
}
