// apps/downloader/src/exchange/ccxt.ts
import ccxt, { BaseError, DDoSProtection, Exchange, NetworkError as CcxtNetworkError, RateLimitExceeded } from "ccxt";
import { ApiError, NetworkError, RateLimitedError } from "../errors.js";
import { log } from "../logger.js";
import type { DataType } from "../types.js";
import type { MarketDataClient, PageRequest } from "./client.js";

type Maybe<T> = T | undefined;

/** The part of a ccxt exchange this client calls. */
export interface CcxtExchange {
  id: string;
  has: Record<string, Maybe<boolean | string>>;
  loadMarkets(): Promise<Record<string, { symbol: string; type?: Maybe<string>; active?: Maybe<boolean> }>>;
  fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): Promise<Array<Array<Maybe<number>>>>;
  fetchTrades(
    symbol: string,
    since?: number,
    limit?: number
  ): Promise<
    Array<{
      id?: Maybe<string>;
      timestamp?: Maybe<number>;
      price?: Maybe<number>;
      amount?: Maybe<number>;
      cost?: Maybe<number>;
      side?: Maybe<string>;
    }>
  >;
  fetchFundingRateHistory(
    symbol?: string,
    since?: number,
    limit?: number
  ): Promise<Array<{ timestamp?: Maybe<number>; fundingRate?: Maybe<number> }>>;
}

type CcxtConstructor = new (config?: Record<string, unknown>) => CcxtExchange;

function isExchangeConstructor(v: unknown): v is CcxtConstructor {
  return typeof v === "function" && v.prototype instanceof Exchange;
}

/** A public (no credentials) ccxt exchange by id, e.g. "binanceusdm" or "bybit". */
export function createCcxtExchange(id: string): CcxtExchange {
  const ctor: unknown = ccxt.exchanges.includes(id) ? Reflect.get(ccxt, id) : undefined;
  if (!isExchangeConstructor(ctor)) throw new ApiError(`unsupported exchange: ${id}`, 400);
  return new ctor({ enableRateLimit: true });
}

export type CcxtClientOptions = {
  /** market type listSymbols keeps ("swap", "spot", "future", ...) */
  marketType?: string;
  /** the exchange's page cap; once known, a shorter page ends a window */
  pageLimit?: number;
};

const REQUIRED: Record<DataType, string> = {
  candles: "fetchOHLCV",
  trades: "fetchTrades",
  funding: "fetchFundingRateHistory"
};

function translate(e: unknown, tag: string): Error {
  const msg = e instanceof Error ? e.message : String(e);
  // RateLimitExceeded extends DDoSProtection extends NetworkError, so order matters
  if (e instanceof RateLimitExceeded || e instanceof DDoSProtection) {
    return new RateLimitedError(`[ccxt] rate limited ${tag}: ${msg}`);
  }
  if (e instanceof CcxtNetworkError) return new NetworkError(`[ccxt] ${tag}: ${msg}`, undefined, { cause: e });
  if (e instanceof BaseError) return new ApiError(`[ccxt] ${tag}: ${msg}`, 400);
  return new NetworkError(`[ccxt] ${tag}: ${msg}`, undefined, { cause: e });
}

/**
 * Any exchange ccxt supports. Symbols are ccxt's unified ids
 * ("BTC/USDT:USDT"). The signal is not passed on: ccxt calls cannot be
 * aborted, the fetcher's page timeout still bounds them.
 */
export class CcxtClient implements MarketDataClient {
  private readonly marketType: string;
  readonly pageLimit: ((dataType: DataType) => number) | undefined;

  constructor(private readonly exchange: CcxtExchange, opts: CcxtClientOptions = {}) {
    this.marketType = opts.marketType ?? "swap";
    const cap = opts.pageLimit;
    this.pageLimit = cap === undefined ? undefined : () => cap;
  }

  async listSymbols(exchange: string): Promise<string[]> {
    this.assertExchange(exchange);
    let markets: Awaited<ReturnType<CcxtExchange["loadMarkets"]>>;
    try {
      markets = await this.exchange.loadMarkets();
    } catch (e) {
      throw translate(e, "loadMarkets");
    }
    return Object.values(markets)
      .filter((m) => m.type === this.marketType && m.active !== false)
      .map((m) => m.symbol)
      .sort();
  }

  async fetchPage(req: PageRequest): Promise<unknown[]> {
    this.assertExchange(req.exchange);
    const method = REQUIRED[req.dataType];
    if (!this.exchange.has[method]) throw new ApiError(`${this.exchange.id} has no ${method}`, 400);

    const tag = `${req.dataType}:${req.symbol}`;
    try {
      switch (req.dataType) {
        case "candles":
          // [timestamp, open, high, low, close, volume] passes through as is
          return await this.exchange.fetchOHLCV(req.symbol, req.subTypeId, req.since, req.limit);
        case "trades": {
          const trades = await this.exchange.fetchTrades(req.symbol, req.since, req.limit);
          return trades.map((t) => ({
            id: t.id ?? null,
            timestamp: t.timestamp,
            price: t.price,
            amount: t.amount,
            cost: t.cost ?? null,
            side: t.side === "buy" || t.side === "sell" ? t.side : null
          }));
        }
        case "funding": {
          const rates = await this.exchange.fetchFundingRateHistory(req.symbol, req.since, req.limit);
          return rates.map((f) => ({ timestamp: f.timestamp, fundingRate: f.fundingRate, markPrice: null }));
        }
      }
    } catch (e) {
      const err = translate(e, tag);
      log.debug(`[ccxt] request failed`, { exchange: this.exchange.id, tag, err: err.message });
      throw err;
    }
  }

  private assertExchange(exchange: string): void {
    if (exchange !== this.exchange.id) throw new ApiError(`client is bound to ${this.exchange.id}, not ${exchange}`, 400);
  }
}
