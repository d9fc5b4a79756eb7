// apps/downloader/src/api.ts
import os from "node:os";
import path from "node:path";
import { dataTypeSpec, isDataType } from "./dataTypes.js";
import { PlanningError } from "./errors.js";
import type { MarketDataClient } from "./exchange/client.js";
import { RateLimitedFetcher } from "./fetcher.js";
import { loadRecords } from "./loader.js";
import { FetchOrchestrator, type SeriesRequest } from "./orchestrator.js";
import { DEFAULT_RATE_LIMIT, TokenBucketLimiter, type RateLimiter } from "./rateLimiter.js";
import type { RetryOptions } from "./retry.js";
import { ParquetPartitionStore } from "./store/ParquetPartitionStore.js";
import type { PartitionStore } from "./store/PartitionStore.js";
import { parseDateInput } from "./time.js";
import type { DataType, DateInput, DownloadSummary, MarketRecord, RateLimitConfig } from "./types.js";

export const DEFAULT_DATA_DIR = path.join(os.homedir(), ".market_cache");

export type StoreOptions = {
  /** root of the partition tree; ignored when `store` is given */
  dataDir?: string;
  store?: PartitionStore;
};

export type DownloadOptions = StoreOptions & {
  client: MarketDataClient;
  candles?: { timeframes?: readonly string[] };
  rateLimit?: RateLimitConfig;
  /** shared limiter; wins over `rateLimit` */
  limiter?: RateLimiter;
  concurrency?: number;
  pageTimeoutMs?: number;
  retry?: Partial<RetryOptions>;
  completenessMarginMs?: number;
  signal?: AbortSignal;
  now?: () => number;
};

export type LoadOptions = StoreOptions;

function resolveStore(opts: StoreOptions): PartitionStore {
  return opts.store ?? new ParquetPartitionStore(opts.dataDir ?? DEFAULT_DATA_DIR);
}

function subTypesFor(dataType: DataType, opts: DownloadOptions): readonly string[] {
  const spec = dataTypeSpec(dataType);
  if (dataType === "candles" && opts.candles?.timeframes?.length) return opts.candles.timeframes;
  return [spec.defaultSubType];
}

/**
 * Brings the local cache up to date for every (data type, sub-type, symbol)
 * over [startDate, endDate). Complete partitions are skipped; incomplete ones
 * are fetched again. Resolves with the per-window summary even when some
 * windows failed.
 */
export async function download(
  exchange: string,
  dataTypes: readonly string[],
  symbols: readonly string[],
  startDate: DateInput,
  endDate: DateInput,
  opts: DownloadOptions
): Promise<DownloadSummary> {
  const start = parseDateInput(startDate);
  const end = parseDateInput(endDate);

  const series: SeriesRequest[] = dataTypes.map((dt) => {
    if (!isDataType(dt)) throw new PlanningError(`Unsupported data type: ${dt}`);
    return { dataType: dt, subTypeIds: subTypesFor(dt, opts) };
  });

  const limiter = opts.limiter ?? new TokenBucketLimiter(opts.rateLimit ?? DEFAULT_RATE_LIMIT);
  const fetcher = new RateLimitedFetcher(opts.client, limiter, {
    pageTimeoutMs: opts.pageTimeoutMs,
    retry: opts.retry
  });
  const orchestrator = new FetchOrchestrator(fetcher, resolveStore(opts), {
    concurrency: opts.concurrency,
    completenessMarginMs: opts.completenessMarginMs,
    now: opts.now
  });

  return orchestrator.downloadAll(exchange, series, symbols, start, end, opts.signal);
}

/** Cached records in [startDate, endDate), sorted, one per dedup key. Never touches the network. */
export async function loadData(
  exchange: string,
  dataType: DataType,
  subTypeId: string,
  symbols: readonly string[] | undefined,
  startDate: DateInput,
  endDate: DateInput,
  opts: LoadOptions = {}
): Promise<MarketRecord[]> {
  const start = parseDateInput(startDate);
  const end = parseDateInput(endDate);
  return loadRecords(resolveStore(opts), exchange, dataType, subTypeId, symbols, start, end);
}

export { DATA_TYPES, isDataType } from "./dataTypes.js";
export * from "./errors.js";
export type { MarketDataClient, PageRequest } from "./exchange/client.js";
export { BINANCE_USDM, BinanceUsdmClient, type BinanceUsdmOptions } from "./exchange/binance.js";
export { CcxtClient, createCcxtExchange, type CcxtClientOptions, type CcxtExchange } from "./exchange/ccxt.js";
export { RateLimitedFetcher, type FetcherOptions } from "./fetcher.js";
export { dedup, normalize } from "./normalize.js";
export { FetchOrchestrator, type OrchestratorOptions } from "./orchestrator.js";
export { plan } from "./planner.js";
export { NoopLimiter, TokenBucketLimiter, type RateLimiter } from "./rateLimiter.js";
export { ParquetPartitionStore } from "./store/ParquetPartitionStore.js";
export type { PartitionStore } from "./store/PartitionStore.js";
export type * from "./types.js";
