// apps/downloader/tests/fetcher.spec.ts
import { describe, expect, it } from "vitest";
import { ApiError, FetchError, NetworkError, RateLimitedError, TimeoutError } from "../src/errors.js";
import { RateLimitedFetcher } from "../src/fetcher.js";
import type { RateLimiter } from "../src/rateLimiter.js";
import type { Window } from "../src/types.js";
import { DAY, DAY0, FakeClient, HOUR, MIN, candleRow, candleServer, listServer, makeFetcher, noSleep } from "./helpers.js";

const FULL_DAY: Window = {
  partitionKey: "2023-09-01",
  start: DAY0,
  end: DAY0 + DAY,
  partitionStart: DAY0,
  partitionEnd: DAY0 + DAY
};

function trade(id: number, timestamp: number) {
  return { id, timestamp, price: "10", amount: "1", side: "buy" };
}

describe("RateLimitedFetcher", () => {
  it("pages a day of minute candles, capping the last page to what is left", async () => {
    const client = new FakeClient(candleServer({ tfMs: MIN, from: DAY0, to: () => DAY0 + 3 * DAY }));

    const records = await makeFetcher(client).fetchWindow("x", "candles", "1m", "BTCUSDT", FULL_DAY);

    expect(client.calls.map((c) => [c.since, c.limit])).toEqual([
      [DAY0, 1000],
      [DAY0 + 1000 * MIN, 440]
    ]);
    expect(records).toHaveLength(1440);
    expect(records[0]?.timestamp).toBe(DAY0);
    expect(records[1439]?.timestamp).toBe(DAY0 + 1439 * MIN);
  });

  it("drops records outside the window", async () => {
    // listing starts at 20:00; the exchange answers with candles past the window end too
    const client = new FakeClient(candleServer({ tfMs: MIN, from: DAY0 + 1200 * MIN, to: () => DAY0 + 3 * DAY }));

    const records = await makeFetcher(client).fetchWindow("x", "candles", "1m", "BTCUSDT", FULL_DAY);

    expect(client.calls).toHaveLength(1);
    expect(records).toHaveLength(240);
    expect(records[0]?.timestamp).toBe(DAY0 + 1200 * MIN);
    expect(records[239]?.timestamp).toBe(DAY0 + 1439 * MIN);
  });

  it("skips past an empty candle page", async () => {
    const window: Window = { ...FULL_DAY, end: DAY0 + 30 * MIN };
    const server = candleServer({ tfMs: MIN, from: DAY0, to: () => DAY0 + DAY });
    const client = new FakeClient((req) => (req.since < DAY0 + 10 * MIN ? [] : server(req)));

    const records = await makeFetcher(client, { pageLimit: 10 }).fetchWindow("x", "candles", "1m", "BTCUSDT", window);

    expect(client.calls.map((c) => c.since)).toEqual([DAY0, DAY0 + 10 * MIN, DAY0 + 20 * MIN]);
    expect(records.map((r) => r.timestamp)).toEqual(Array.from({ length: 20 }, (_, i) => DAY0 + (10 + i) * MIN));
  });

  it("re-requests a shared trade millisecond and removes the overlap", async () => {
    const rows = [trade(1, 1000), trade(2, 2000), trade(3, 2000), trade(4, 2000), trade(5, 3000)];
    const client = new FakeClient(listServer(rows));
    const window: Window = { ...FULL_DAY, start: 0, end: 10_000 };

    const records = await makeFetcher(client, { pageLimit: 3 }).fetchWindow("x", "trades", "all", "BTCUSDT", window);

    expect(client.calls.map((c) => c.since)).toEqual([0, 2000, 2001]);
    expect(records.map((r) => (r.kind === "trade" ? r.id : null))).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("stops when the cursor stops moving", async () => {
    // a server that ignores `since`
    const page = [trade(1, 2000), trade(2, 2000), trade(3, 2000)];
    const client = new FakeClient(() => page);
    const window: Window = { ...FULL_DAY, start: 0, end: 10_000 };

    const records = await makeFetcher(client, { pageLimit: 3 }).fetchWindow("x", "trades", "all", "BTCUSDT", window);

    expect(client.calls.map((c) => c.since)).toEqual([0, 2000, 2001]);
    expect(records).toHaveLength(3);
  });

  it("stops funding paging on a short page", async () => {
    const rows = [0, 8, 16, 24, 32].map((h) => ({ timestamp: DAY0 + h * 3_600_000, fundingRate: "0.0001" }));
    const client = new FakeClient(listServer(rows));

    const records = await makeFetcher(client).fetchWindow("x", "funding", "rate", "BTCUSDT", FULL_DAY);

    expect(client.calls).toHaveLength(1);
    expect(records.map((r) => r.timestamp)).toEqual([DAY0, DAY0 + 8 * 3_600_000, DAY0 + 16 * 3_600_000]);
  });

  it("retries a rate-limited page after the server's delay and pauses the limiter", async () => {
    const sleeps: number[] = [];
    const penalties: number[] = [];
    let acquired = 0;
    const limiter: RateLimiter = {
      acquire: async () => {
        acquired += 1;
      },
      penalize: (ms) => {
        penalties.push(ms);
      }
    };
    let calls = 0;
    const client = new FakeClient(() => {
      calls += 1;
      if (calls === 1) throw new RateLimitedError("slow down", 2000);
      return [candleRow(DAY0)];
    });
    const fetcher = new RateLimitedFetcher(client, limiter, {
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });
    const window: Window = { ...FULL_DAY, end: DAY0 + MIN };

    const records = await fetcher.fetchWindow("x", "candles", "1m", "BTCUSDT", window);

    expect(records).toHaveLength(1);
    expect(acquired).toBe(2);
    expect(penalties).toEqual([2000]);
    expect(sleeps).toEqual([2000]);
  });

  it("fails the window with FetchError once retries run out", async () => {
    const client = new FakeClient(() => {
      throw new NetworkError("socket hang up");
    });
    const fetcher = makeFetcher(client, { retry: { maxRetries: 2, baseMs: 1, maxMs: 1 } });

    const err = await fetcher.fetchWindow("x", "candles", "1m", "BTCUSDT", FULL_DAY).catch((e: unknown) => e);

    expect(client.calls).toHaveLength(3);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ symbol: "BTCUSDT", window: FULL_DAY });
    expect(err instanceof FetchError && err.cause).toBeInstanceOf(NetworkError);
  });

  it("does not retry an API rejection", async () => {
    const client = new FakeClient(() => {
      throw new ApiError("Invalid symbol", 400);
    });

    const err = await makeFetcher(client).fetchWindow("x", "candles", "1m", "NOPE", FULL_DAY).catch((e: unknown) => e);

    expect(client.calls).toHaveLength(1);
    expect(err instanceof FetchError && err.cause).toBeInstanceOf(ApiError);
  });

  it("times out a hanging page and aborts its request", async () => {
    const signals: AbortSignal[] = [];
    const client = new FakeClient(
      (_req, signal) =>
        new Promise<unknown[]>((_, reject) => {
          if (signal) signals.push(signal);
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const fetcher = makeFetcher(client, { pageTimeoutMs: 20, retry: { maxRetries: 1, baseMs: 1, maxMs: 1 } });

    const err = await fetcher.fetchWindow("x", "candles", "1m", "BTCUSDT", FULL_DAY).catch((e: unknown) => e);

    expect(client.calls).toHaveLength(2);
    expect(err instanceof FetchError && err.cause).toBeInstanceOf(TimeoutError);
    expect(signals.map((s) => s.aborted)).toEqual([true, true]);
  });

  it("returns nothing for a window the exchange has no data for", async () => {
    const client = new FakeClient(() => []);
    const fetcher = new RateLimitedFetcher(client, { acquire: async () => {}, penalize: () => {} }, { sleep: noSleep });

    await expect(fetcher.fetchWindow("x", "funding", "rate", "BTCUSDT", FULL_DAY)).resolves.toEqual([]);
    // one funding interval per empty page until the window ends
    expect(client.calls.map((c) => c.since)).toEqual([DAY0, DAY0 + 8 * HOUR, DAY0 + 16 * HOUR]);
  });

  it("steps past a quiet trade hour instead of ending the window", async () => {
    const rows = [trade(7, DAY0 + 2 * HOUR)];
    const server = listServer(rows);
    const client = new FakeClient((req) => (req.since < DAY0 + HOUR ? [] : server(req)));

    const records = await makeFetcher(client).fetchWindow("x", "trades", "all", "BTCUSDT", FULL_DAY);

    expect(client.calls.map((c) => c.since)).toEqual([DAY0, DAY0 + HOUR]);
    expect(records).toMatchObject([{ kind: "trade", id: "7", timestamp: DAY0 + 2 * HOUR }]);
  });

  it("does not end a window on a short page when the client reports no page cap", async () => {
    // the exchange serves two rows a page whatever the limit
    const rows = [0, 8, 16, 24].map((h) => ({ timestamp: DAY0 + h * HOUR, fundingRate: "0.0001" }));
    const server = listServer(rows);
    const client = new FakeClient((req) => server({ ...req, limit: 2 }));
    client.pageLimit = undefined;

    const records = await makeFetcher(client).fetchWindow("x", "funding", "rate", "BTCUSDT", FULL_DAY);

    expect(client.calls.map((c) => [c.since, c.limit])).toEqual([
      [DAY0, 1000],
      [DAY0 + 8 * HOUR + 1, 1000]
    ]);
    expect(records.map((r) => r.timestamp)).toEqual([DAY0, DAY0 + 8 * HOUR, DAY0 + 16 * HOUR]);
  });

  it("asks for no more than the client's page cap", async () => {
    const client = new FakeClient(candleServer({ tfMs: MIN, from: DAY0, to: () => DAY0 + DAY }));
    client.pageLimit = () => 500;

    const records = await makeFetcher(client).fetchWindow("x", "candles", "1m", "BTCUSDT", FULL_DAY);

    expect(client.calls.map((c) => [c.since, c.limit])).toEqual([
      [DAY0, 500],
      [DAY0 + 500 * MIN, 500],
      [DAY0 + 1000 * MIN, 440]
    ]);
    expect(records).toHaveLength(1440);
  });
});
