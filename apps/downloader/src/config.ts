// apps/downloader/src/config.ts
import os from "node:os";
import path from "node:path";
import { isDataType } from "./dataTypes.js";
import { BINANCE_USDM, BINANCE_USDM_BASE } from "./exchange/binance.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { DEFAULT_COMPLETENESS_MARGIN_MS, DEFAULT_CONCURRENCY } from "./orchestrator.js";
import { DEFAULT_PAGE_TIMEOUT_MS } from "./fetcher.js";
import { DEFAULT_RATE_LIMIT } from "./rateLimiter.js";
import { DEFAULT_RETRY, type RetryOptions } from "./retry.js";
import { isTimeframe } from "./timeframes.js";
import { parseDateInput, utcMidnight } from "./time.js";
import type { DataType, RateLimitConfig, Timeframe } from "./types.js";

type Env = Record<string, string | undefined>;

export type ClientKind = "ccxt" | "binance";

export type Config = {
  exchange: string;
  /** ccxt for any exchange; binance for the native USD-M client */
  client: ClientKind;
  marketType: string;
  /** page cap of the exchange, when known */
  pageLimit: number | null;
  dataTypes: DataType[];
  /** null = every symbol the exchange lists */
  symbols: string[] | null;
  timeframes: Timeframe[];
  start: number;
  end: number;
  dataDir: string;
  concurrency: number;
  rateLimit: RateLimitConfig;
  pageTimeoutMs: number;
  retry: RetryOptions;
  completenessMarginMs: number;
  binanceBaseUrl: string;
  logLevel: LogLevel;
};

function isClientKind(v: string): v is ClientKind {
  return v === "ccxt" || v === "binance";
}

function csv(v: string | undefined): string[] {
  if (!v) return [];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function expandHome(p: string): string {
  return p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
}

export function loadConfig(env: Env = process.env): Config {
  function req(name: string): string {
    const v = env[name]?.trim();
    if (!v) throw new Error(`Missing env: ${name}`);
    return v;
  }

  function opt(name: string, def: string): string {
    const v = env[name]?.trim();
    return v ? v : def;
  }

  function num(name: string, def: number, min: number): number {
    const raw = opt(name, String(def));
    const n = Number(raw);
    if (!Number.isFinite(n) || n < min) throw new Error(`Invalid ${name}: ${raw}`);
    return n;
  }

  const dataTypes = csv(opt("DATA_TYPES", "candles")).map((v) => {
    if (!isDataType(v)) throw new Error(`Invalid DATA_TYPES entry: ${v}`);
    return v;
  });

  const timeframes = csv(opt("TIMEFRAMES", "1m")).map((v) => {
    if (!isTimeframe(v)) throw new Error(`Unsupported timeframe: ${v}`);
    return v;
  });

  const symbolsRaw = csv(env.SYMBOLS);
  const all = symbolsRaw.length === 0 || (symbolsRaw.length === 1 && symbolsRaw[0]?.toUpperCase() === "ALL");

  const start = parseDateInput(req("START_DATE"));
  const endRaw = env.END_DATE?.trim();
  const end = endRaw ? parseDateInput(endRaw) : utcMidnight(Date.now());
  if (!(start < end)) throw new Error(`END_DATE must be after START_DATE`);

  const client = opt("CLIENT", "ccxt").toLowerCase();
  if (!isClientKind(client)) throw new Error(`Invalid CLIENT: ${client}`);

  const pageLimitRaw = env.PAGE_LIMIT?.trim();
  const pageLimit = pageLimitRaw ? num("PAGE_LIMIT", 0, 1) : null;

  const logLevel = opt("LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(logLevel)) throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);

  return {
    exchange: opt("EXCHANGE", BINANCE_USDM),
    client,
    marketType: opt("MARKET_TYPE", "swap"),
    pageLimit,
    dataTypes,
    symbols: all ? null : symbolsRaw,
    timeframes,
    start,
    end,
    dataDir: expandHome(opt("DATA_DIR", path.join(os.homedir(), ".market_cache"))),
    concurrency: num("CONCURRENCY", DEFAULT_CONCURRENCY, 1),
    rateLimit: {
      maxRequests: num("RATE_LIMIT_MAX", DEFAULT_RATE_LIMIT.maxRequests, 1),
      intervalMs: num("RATE_LIMIT_INTERVAL_MS", DEFAULT_RATE_LIMIT.intervalMs, 1)
    },
    pageTimeoutMs: num("PAGE_TIMEOUT_MS", DEFAULT_PAGE_TIMEOUT_MS, 1),
    retry: {
      maxRetries: num("MAX_RETRIES", DEFAULT_RETRY.maxRetries, 0),
      baseMs: num("RETRY_BASE_MS", DEFAULT_RETRY.baseMs, 0),
      maxMs: num("RETRY_MAX_MS", DEFAULT_RETRY.maxMs, 0)
    },
    completenessMarginMs: num("COMPLETENESS_MARGIN_MS", DEFAULT_COMPLETENESS_MARGIN_MS, 0),
    binanceBaseUrl: opt("BINANCE_REST_BASE", BINANCE_USDM_BASE),
    logLevel
  };
}
