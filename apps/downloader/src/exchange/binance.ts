// apps/downloader/src/exchange/binance.ts
import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { ApiError, NetworkError, RateLimitedError } from "../errors.js";
import { log } from "../logger.js";
import type { DataType } from "../types.js";
import type { MarketDataClient, PageRequest } from "./client.js";

export const BINANCE_USDM = "binanceusdm";
export const BINANCE_USDM_BASE = "https://fapi.binance.com";

// per-endpoint maxima of the USD-M REST API
const MAX_LIMIT = { candles: 1500, trades: 1000, funding: 1000 } as const;

const AggTradeSchema = z.object({
  a: z.number(),
  p: z.string(),
  q: z.string(),
  T: z.number(),
  m: z.boolean()
});

const FundingSchema = z.object({
  fundingTime: z.number(),
  fundingRate: z.string(),
  markPrice: z.string().optional()
});

const ExchangeInfoSchema = z.object({
  symbols: z.array(z.object({ symbol: z.string(), status: z.string(), contractType: z.string().optional() }))
});

export type BinanceUsdmOptions = {
  baseUrl?: string;
  /** undici dispatcher (agent, proxy, or a MockAgent in tests) */
  dispatcher?: Dispatcher;
};

function retryAfterMs(headers: Record<string, string | string[] | undefined>): number | undefined {
  const raw = headers["retry-after"];
  const v = Array.isArray(raw) ? raw[0] : raw;
  if (v == null) return undefined;
  const sec = Number(v);
  return Number.isFinite(sec) && sec >= 0 ? Math.ceil(sec * 1000) : undefined;
}

/**
 * Binance USD-M futures public REST. Symbols are the exchange's own ids
 * ("BTCUSDT"). Pages are returned in the raw shapes normalize() accepts.
 */
export class BinanceUsdmClient implements MarketDataClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: BinanceUsdmOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? BINANCE_USDM_BASE).replace(/\/+$/, "");
  }

  async listSymbols(exchange: string): Promise<string[]> {
    this.assertExchange(exchange);
    const body = await this.getJson("/fapi/v1/exchangeInfo", {}, "exchangeInfo");
    const info = this.parse(ExchangeInfoSchema, body, "exchangeInfo");
    return info.symbols
      .filter((s) => s.status === "TRADING" && s.contractType === "PERPETUAL")
      .map((s) => s.symbol)
      .sort();
  }

  pageLimit(dataType: DataType): number {
    return MAX_LIMIT[dataType];
  }

  async fetchPage(req: PageRequest, opts: { signal?: AbortSignal } = {}): Promise<unknown[]> {
    this.assertExchange(req.exchange);
    const limit = Math.min(req.limit, MAX_LIMIT[req.dataType]);
    const tag = `${req.dataType}:${req.symbol}`;

    switch (req.dataType) {
      case "candles": {
        const body = await this.getJson(
          "/fapi/v1/klines",
          { symbol: req.symbol, interval: req.subTypeId, startTime: req.since, limit },
          tag,
          opts.signal
        );
        // [openTime, open, high, low, close, volume, closeTime, ...] passes through as is
        return this.parse(z.array(z.unknown()), body, tag);
      }
      case "trades": {
        const body = await this.getJson(
          "/fapi/v1/aggTrades",
          { symbol: req.symbol, startTime: req.since, limit },
          tag,
          opts.signal
        );
        // m: buyer was the maker, so the aggressor sold
        return this.parse(z.array(AggTradeSchema), body, tag).map((t) => ({
          id: String(t.a),
          timestamp: t.T,
          price: t.p,
          amount: t.q,
          side: t.m ? "sell" : "buy"
        }));
      }
      case "funding": {
        const body = await this.getJson(
          "/fapi/v1/fundingRate",
          { symbol: req.symbol, startTime: req.since, limit },
          tag,
          opts.signal
        );
        return this.parse(z.array(FundingSchema), body, tag).map((f) => ({
          timestamp: f.fundingTime,
          fundingRate: f.fundingRate,
          markPrice: f.markPrice === undefined || f.markPrice === "" ? null : f.markPrice
        }));
      }
    }
  }

  private assertExchange(exchange: string): void {
    if (exchange !== BINANCE_USDM) throw new ApiError(`unsupported exchange: ${exchange}`, 400);
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, tag: string): T {
    const r = schema.safeParse(body);
    if (!r.success) throw new ApiError(`[binance] unexpected response ${tag}: ${r.error.message}`, 200);
    return r.data;
  }

  private async getJson(
    pathname: string,
    query: Record<string, string | number>,
    tag: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    const qs = new URLSearchParams(Object.entries(query).map(([k, v]): [string, string] => [k, String(v)])).toString();
    const url = `${this.baseUrl}${pathname}${qs ? `?${qs}` : ""}`;

    let res: Dispatcher.ResponseData;
    try {
      res = await request(url, {
        method: "GET",
        signal,
        dispatcher: this.opts.dispatcher,
        headers: { accept: "application/json" }
      });
    } catch (e) {
      log.debug(`[binance] request failed`, { tag, err: e instanceof Error ? e.message : String(e) });
      throw new NetworkError(`[binance] request failed ${tag}`, undefined, { cause: e });
    }

    const status = res.statusCode;
    if (status === 429 || status === 418) {
      const text = await res.body.text();
      throw new RateLimitedError(
        `[binance] rate limited status=${status} ${tag} body=${text.slice(0, 200)}`,
        retryAfterMs(res.headers)
      );
    }
    if (status >= 500) {
      const text = await res.body.text();
      throw new NetworkError(`[binance] http ${status} ${tag} body=${text.slice(0, 200)}`, status);
    }
    if (status < 200 || status >= 300) {
      const text = await res.body.text();
      throw new ApiError(`[binance] http ${status} ${tag} body=${text.slice(0, 300)}`, status);
    }

    try {
      return await res.body.json();
    } catch (e) {
      throw new NetworkError(`[binance] bad json ${tag}`, status, { cause: e });
    }
  }
}
