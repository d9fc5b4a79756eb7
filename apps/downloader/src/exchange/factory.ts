// apps/downloader/src/exchange/factory.ts
import type { Config } from "../config.js";
import { BINANCE_USDM, BinanceUsdmClient } from "./binance.js";
import { CcxtClient, createCcxtExchange } from "./ccxt.js";
import type { MarketDataClient } from "./client.js";

export function createClient(
  cfg: Pick<Config, "exchange" | "client" | "marketType" | "pageLimit" | "binanceBaseUrl">
): MarketDataClient {
  if (cfg.client === "binance") {
    if (cfg.exchange !== BINANCE_USDM) throw new Error(`CLIENT=binance only serves ${BINANCE_USDM}, not ${cfg.exchange}`);
    return new BinanceUsdmClient({ baseUrl: cfg.binanceBaseUrl });
  }
  return new CcxtClient(createCcxtExchange(cfg.exchange), {
    marketType: cfg.marketType,
    pageLimit: cfg.pageLimit ?? undefined
  });
}
