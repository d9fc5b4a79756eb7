// apps/downloader/src/retry.ts
import { log } from "./logger.js";

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function jitter(ms: number, random: () => number): number {
  const j = ms * (0.2 * (random() * 2 - 1)); // +/-20%
  return Math.max(0, Math.floor(ms + j));
}

export type RetryOptions = {
  maxRetries: number;
  baseMs: number;
  maxMs: number;
};

export const DEFAULT_RETRY: RetryOptions = { maxRetries: 5, baseMs: 500, maxMs: 30_000 };

export type RetryDecision = { retry: boolean; waitMs?: number; reason?: string };

export type RetryCtx = RetryOptions & {
  label: string;
  sleep?: Sleep;
  random?: () => number;
};

export function backoffMs(attempt: number, opts: RetryOptions): number {
  return Math.min(opts.maxMs, opts.baseMs * Math.pow(2, attempt));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (e: unknown) => RetryDecision,
  ctx: RetryCtx
): Promise<T> {
  const pause = ctx.sleep ?? sleep;
  const random = ctx.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      const d = shouldRetry(e);
      if (!d.retry || attempt >= ctx.maxRetries) throw e;

      const waitMs = d.waitMs ?? jitter(backoffMs(attempt, ctx), random);
      log.warn(
        `[retry] ${ctx.label} attempt=${attempt + 1}/${ctx.maxRetries} wait=${waitMs}ms reason=${d.reason ?? "n/a"}`
      );
      await pause(waitMs);
    }
  }
}
