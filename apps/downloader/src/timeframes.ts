// apps/downloader/src/timeframes.ts
import type { PartitionUnit, Timeframe } from "./types.js";

export const TF_MS: Record<Timeframe, number> = {
  "1m": 60_000,
  "3m": 180_000,
  "5m": 300_000,
  "15m": 900_000,
  "30m": 1_800_000,
  "1h": 3_600_000,
  "2h": 7_200_000,
  "4h": 14_400_000,
  "6h": 21_600_000,
  "8h": 28_800_000,
  "12h": 43_200_000,
  "1d": 86_400_000
};

export const TIMEFRAMES: readonly Timeframe[] = [
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "8h",
  "12h",
  "1d"
];

export function isTimeframe(v: string): v is Timeframe {
  return TIMEFRAMES.some((tf) => tf === v);
}

export function tfToMs(tf: Timeframe): number {
  return TF_MS[tf];
}

/**
 * Partition unit per timeframe. Keeps one partition at a few hundred to
 * ~1500 candles: minutely data per day, hourly per month, daily per year.
 */
export function tfPartitionUnit(tf: Timeframe): PartitionUnit {
  const ms = TF_MS[tf];
  if (ms < TF_MS["1h"]) return "day";
  if (ms < TF_MS["1d"]) return "month";
  return "year";
}
