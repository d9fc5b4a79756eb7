// apps/downloader/tests/retry.spec.ts
import { describe, expect, it } from "vitest";
import { backoffMs, withRetry, type RetryDecision } from "../src/retry.js";

const always = (): RetryDecision => ({ retry: true });
const never = (): RetryDecision => ({ retry: false });

function ctx(maxRetries: number, sleeps: number[]) {
  return {
    label: "test",
    maxRetries,
    baseMs: 500,
    maxMs: 30_000,
    random: () => 0.5, // no jitter
    sleep: async (ms: number) => {
      sleeps.push(ms);
    }
  };
}

describe("withRetry", () => {
  it("retries with exponential backoff until the call succeeds", async () => {
    const sleeps: number[] = [];
    let calls = 0;

    const out = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error("flaky");
        return "ok";
      },
      always,
      ctx(5, sleeps)
    );

    expect(out).toBe("ok");
    expect(calls).toBe(3);
    expect(sleeps).toEqual([500, 1000]);
  });

  it("rethrows at once when the error is not retryable", async () => {
    const sleeps: number[] = [];
    let calls = 0;
    const boom = new Error("boom");

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw boom;
        },
        never,
        ctx(5, sleeps)
      )
    ).rejects.toBe(boom);
    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it("gives up after maxRetries retries with the last error", async () => {
    const sleeps: number[] = [];
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error(`fail ${calls}`);
        },
        always,
        ctx(2, sleeps)
      )
    ).rejects.toThrow("fail 3");
    expect(calls).toBe(3);
  });

  it("waits exactly as long as the decision asks", async () => {
    const sleeps: number[] = [];
    let calls = 0;

    await withRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new Error("429");
      },
      () => ({ retry: true, waitMs: 2500 }),
      ctx(1, sleeps)
    );
    expect(sleeps).toEqual([2500]);
  });
});

describe("backoffMs", () => {
  it("doubles per attempt and caps at maxMs", () => {
    const opts = { maxRetries: 10, baseMs: 500, maxMs: 30_000 };
    expect([0, 1, 2, 3].map((a) => backoffMs(a, opts))).toEqual([500, 1000, 2000, 4000]);
    expect(backoffMs(10, opts)).toBe(30_000);
  });
});
