// apps/downloader/src/orchestrator.ts
import { OutOfRangeError, toError } from "./errors.js";
import type { RateLimitedFetcher } from "./fetcher.js";
import { log } from "./logger.js";
import { dedup } from "./normalize.js";
import { fromStatus, transition } from "./partitionState.js";
import { plan } from "./planner.js";
import { type PartitionStore, refLabel, statusOf } from "./store/PartitionStore.js";
import type {
  DataType,
  DownloadSummary,
  PartitionHeader,
  PartitionRef,
  Window,
  WindowOutcome,
  WindowStatus
} from "./types.js";
import { KeyedMutex } from "./utils/keyedMutex.js";
import { mapLimit } from "./utils/pool.js";

export type OrchestratorOptions = {
  concurrency?: number;
  /** a partition only counts as complete once it ended at least this long ago */
  completenessMarginMs?: number;
  now?: () => number;
};

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_COMPLETENESS_MARGIN_MS = 120_000;

export type SeriesRequest = { dataType: DataType; subTypeIds: readonly string[] };

type Job = { ref: PartitionRef; window: Window };

export type Coverage = { start: number; end: number };

/**
 * Stored coverage and the new window are merged when they overlap or touch;
 * a disjoint old span is dropped, since the gap between them was never fetched.
 */
export function mergeCoverage(prev: Coverage | null, window: Pick<Window, "start" | "end">): Coverage {
  if (prev && prev.start <= window.end && window.start <= prev.end) {
    return { start: Math.min(prev.start, window.start), end: Math.max(prev.end, window.end) };
  }
  return { start: window.start, end: window.end };
}

export function emptySummary(): DownloadSummary {
  return { fetched: 0, skipped: 0, failed: 0, empty: 0, cancelled: 0, warnings: 0, outcomes: [] };
}

export function summarize(outcomes: readonly WindowOutcome[]): DownloadSummary {
  const s = emptySummary();
  for (const o of outcomes) {
    s[o.status] += 1;
    if (o.warning) s.warnings += 1;
    s.outcomes.push(o);
  }
  return s;
}

export class FetchOrchestrator {
  private readonly mutex = new KeyedMutex();
  private readonly concurrency: number;
  private readonly marginMs: number;
  private readonly now: () => number;

  constructor(
    private readonly fetcher: RateLimitedFetcher,
    private readonly store: PartitionStore,
    opts: OrchestratorOptions = {}
  ) {
    this.concurrency = Math.max(1, Math.floor(opts.concurrency ?? DEFAULT_CONCURRENCY));
    this.marginMs = opts.completenessMarginMs ?? DEFAULT_COMPLETENESS_MARGIN_MS;
    this.now = opts.now ?? Date.now;
  }

  download(
    exchange: string,
    dataType: DataType,
    subTypeIds: readonly string[],
    symbols: readonly string[],
    start: number,
    end: number,
    signal?: AbortSignal
  ): Promise<DownloadSummary> {
    return this.downloadAll(exchange, [{ dataType, subTypeIds }], symbols, start, end, signal);
  }

  /** Several data types through one pool. Planning errors reject before any fetch starts. */
  async downloadAll(
    exchange: string,
    series: readonly SeriesRequest[],
    symbols: readonly string[],
    start: number,
    end: number,
    signal?: AbortSignal
  ): Promise<DownloadSummary> {
    const now = this.now();
    const jobs: Job[] = [];
    for (const { dataType, subTypeIds } of series) {
      for (const subTypeId of subTypeIds) {
        const windows = plan(dataType, subTypeId, start, end, now);
        for (const symbol of symbols) {
          for (const window of windows) {
            jobs.push({
              ref: { exchange, dataType, subTypeId, symbol, partitionKey: window.partitionKey },
              window
            });
          }
        }
      }
    }

    log.info(`[download] start`, { exchange, windows: jobs.length, concurrency: this.concurrency });

    const outcomes = await mapLimit(
      jobs,
      this.concurrency,
      (job) => this.runWindow(job),
      signal ? { signal, onSkip: (job) => this.outcome(job, "cancelled", 0) } : undefined
    );

    const summary = summarize(outcomes);
    log.info(`[download] done`, {
      exchange,
      fetched: summary.fetched,
      skipped: summary.skipped,
      empty: summary.empty,
      failed: summary.failed,
      cancelled: summary.cancelled,
      warnings: summary.warnings
    });
    return summary;
  }

  /**
   * A window is already satisfied when the stored coverage spans it and that
   * coverage had fully elapsed when it was written.
   */
  private covers(header: PartitionHeader, window: Window): boolean {
    return (
      header.coverageStart <= window.start &&
      header.coverageEnd >= window.end &&
      header.coverageEnd < header.writtenAt - this.marginMs
    );
  }

  private runWindow(job: Job): Promise<WindowOutcome> {
    return this.mutex.runExclusive(refLabel(job.ref), async () => {
      const { ref, window } = job;

      let header: PartitionHeader | null;
      try {
        header = await this.store.header(ref);
      } catch (e) {
        return this.failed(job, e);
      }

      const stored = fromStatus(statusOf(header));
      if (stored.kind === "complete") {
        log.debug(`[download] skip complete`, { partition: refLabel(ref) });
        return this.outcome(job, "skipped", 0, { complete: true });
      }
      if (header && this.covers(header, window)) {
        log.debug(`[download] skip covered window`, { partition: refLabel(ref) });
        return this.outcome(job, "skipped", 0, { complete: false });
      }

      const fetching = transition(stored, { type: "begin" });
      try {
        const fetched = await this.fetcher.fetchWindow(ref.exchange, ref.dataType, ref.subTypeId, ref.symbol, window);

        if (fetched.length === 0) {
          const elapsed = window.end < this.now() - this.marginMs;
          const warning = elapsed ? new OutOfRangeError(ref.symbol, window) : undefined;
          if (warning) log.warn(`[download] ${warning.message}`);
          return this.outcome(job, "empty", 0, { warning });
        }

        const existing = header ? await this.store.read(ref) : [];
        const merged = dedup(ref.dataType, existing, fetched);
        const coverage = mergeCoverage(
          header ? { start: header.coverageStart, end: header.coverageEnd } : null,
          window
        );
        const spansPartition =
          coverage.start <= window.partitionStart &&
          coverage.end >= window.partitionEnd &&
          window.partitionEnd < this.now() - this.marginMs;

        await this.store.write(ref, merged, {
          complete: spansPartition,
          coverageStart: coverage.start,
          coverageEnd: coverage.end
        });
        const committed = transition(fetching, { type: "commit", complete: spansPartition });
        log.debug(`[download] committed`, { partition: refLabel(ref), rows: merged.length, state: committed.kind });
        return this.outcome(job, "fetched", fetched.length, { complete: committed.kind === "complete" });
      } catch (e) {
        return this.failed(job, e);
      }
    });
  }

  private failed(job: Job, e: unknown): WindowOutcome {
    const error = toError(e);
    log.warn(`[download] window failed ${refLabel(job.ref)}: ${error.message}`);
    return this.outcome(job, "failed", 0, { error });
  }

  private outcome(
    job: Job,
    status: WindowStatus,
    records: number,
    extra: Pick<WindowOutcome, "complete" | "error" | "warning"> = {}
  ): WindowOutcome {
    const { ref, window } = job;
    return {
      exchange: ref.exchange,
      dataType: ref.dataType,
      subTypeId: ref.subTypeId,
      symbol: ref.symbol,
      window,
      status,
      records,
      ...extra
    };
  }
}
