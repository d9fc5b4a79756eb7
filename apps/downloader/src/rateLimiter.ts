// apps/downloader/src/rateLimiter.ts
import { log } from "./logger.js";
import { sleep, type Sleep } from "./retry.js";
import type { RateLimitConfig } from "./types.js";

export interface RateLimiter {
  /** Resolves once the caller may issue one request. */
  acquire(): Promise<void>;
  /** Hold every caller back for `ms` (e.g. after the remote answered 429). */
  penalize(ms: number): void;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = { maxRequests: 100, intervalMs: 30_000 };

/**
 * Token bucket: `maxRequests` per `intervalMs`, refilled continuously, bursts
 * up to `maxRequests`. A caller takes its token synchronously and may drive the
 * balance negative; the deficit is how long it sleeps. Concurrent callers are
 * therefore served in call order without a queue.
 */
export class TokenBucketLimiter implements RateLimiter {
  private readonly ratePerMs: number;
  private readonly capacity: number;
  private tokens: number;
  private updatedAt: number;
  private pausedUntil = 0;

  constructor(
    cfg: RateLimitConfig = DEFAULT_RATE_LIMIT,
    private readonly clock: { now: () => number; sleep: Sleep } = { now: Date.now, sleep }
  ) {
    if (!(cfg.maxRequests > 0) || !(cfg.intervalMs > 0)) {
      throw new Error(`Invalid rate limit maxRequests=${cfg.maxRequests} intervalMs=${cfg.intervalMs}`);
    }
    this.capacity = cfg.maxRequests;
    this.ratePerMs = cfg.maxRequests / cfg.intervalMs;
    this.tokens = cfg.maxRequests;
    this.updatedAt = this.clock.now();
  }

  async acquire(): Promise<void> {
    const now = this.clock.now();
    this.refill(now);
    this.tokens -= 1;

    const deficitMs = this.tokens < 0 ? Math.ceil(-this.tokens / this.ratePerMs) : 0;
    const pauseMs = Math.max(0, this.pausedUntil - now);
    const waitMs = Math.max(deficitMs, pauseMs);
    if (waitMs > 0) await this.clock.sleep(waitMs);
  }

  penalize(ms: number): void {
    if (!(ms > 0)) return;
    const until = this.clock.now() + ms;
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
      log.warn(`[limiter] paused`, { ms });
    }
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.updatedAt);
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.ratePerMs);
    this.updatedAt = now;
  }
}

/** For tests and for clients that do their own throttling. */
export class NoopLimiter implements RateLimiter {
  async acquire(): Promise<void> {}
  penalize(): void {}
}
