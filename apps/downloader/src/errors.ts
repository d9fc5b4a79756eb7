// apps/downloader/src/errors.ts
import type { PartitionRef, Window } from "./types.js";

export type ErrorCode =
  | "PLANNING"
  | "FETCH"
  | "RATE_LIMITED"
  | "NETWORK"
  | "TIMEOUT"
  | "API"
  | "STORE_IO"
  | "NOT_FOUND"
  | "OUT_OF_RANGE";

export class MarketCacheError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PlanningError extends MarketCacheError {
  constructor(message: string) {
    super("PLANNING", message);
  }
}

export class RateLimitedError extends MarketCacheError {
  constructor(message: string, readonly retryAfterMs?: number) {
    super("RATE_LIMITED", message);
  }
}

export class NetworkError extends MarketCacheError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super("NETWORK", message, options);
  }
}

export class TimeoutError extends MarketCacheError {
  constructor(readonly timeoutMs: number, label: string) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
  }
}

/** Remote rejected the request for a reason retrying will not fix (bad symbol, bad params). */
export class ApiError extends MarketCacheError {
  constructor(message: string, readonly status: number) {
    super("API", message);
  }
}

function fmtWindow(w: Window): string {
  return `${w.partitionKey} [${new Date(w.start).toISOString()}, ${new Date(w.end).toISOString()})`;
}

export class FetchError extends MarketCacheError {
  constructor(readonly symbol: string, readonly window: Window, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("FETCH", `fetch failed symbol=${symbol} window=${fmtWindow(window)}: ${reason}`, { cause });
  }
}

export class StoreIOError extends MarketCacheError {
  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super("STORE_IO", message, options);
  }
}

export class NotFoundError extends MarketCacheError {
  constructor(readonly ref: PartitionRef) {
    super(
      "NOT_FOUND",
      `partition not found ${ref.exchange}/${ref.dataType}/${ref.subTypeId}/${ref.symbol}/${ref.partitionKey}`
    );
  }
}

export class OutOfRangeError extends MarketCacheError {
  constructor(readonly symbol: string, readonly window: Window) {
    super("OUT_OF_RANGE", `no data returned for elapsed window symbol=${symbol} window=${fmtWindow(window)}`);
  }
}

export function isRetryable(e: unknown): boolean {
  return e instanceof RateLimitedError || e instanceof NetworkError || e instanceof TimeoutError;
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
