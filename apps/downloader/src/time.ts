// apps/downloader/src/time.ts
import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import { PlanningError } from "./errors.js";
import type { DateInput, PartitionUnit } from "./types.js";

dayjs.extend(utc);

const KEY_FORMAT: Record<PartitionUnit, string> = {
  day: "YYYY-MM-DD",
  month: "YYYY-MM",
  year: "YYYY"
};

export const DAY_MS = 86_400_000;

/**
 * "2023-09-01" -> UTC midnight. Strings without an offset are read as UTC,
 * never in the host's timezone.
 */
export function parseDateInput(v: DateInput): number {
  if (typeof v === "number") {
    if (!Number.isFinite(v)) throw new PlanningError(`Invalid timestamp: ${v}`);
    return v;
  }
  if (v instanceof Date) {
    const ms = v.getTime();
    if (!Number.isFinite(ms)) throw new PlanningError("Invalid Date");
    return ms;
  }

  const s = v.trim();
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(s);
  const d = hasOffset ? dayjs(s) : dayjs.utc(s);
  if (!s || !d.isValid()) throw new PlanningError(`Invalid date: ${v}`);
  return d.valueOf();
}

export function partitionStartOf(epochMs: number, unit: PartitionUnit): number {
  return dayjs.utc(epochMs).startOf(unit).valueOf();
}

export function partitionEndOf(epochMs: number, unit: PartitionUnit): number {
  return dayjs.utc(partitionStartOf(epochMs, unit)).add(1, unit).valueOf();
}

export function partitionKeyOf(epochMs: number, unit: PartitionUnit): string {
  return dayjs.utc(epochMs).format(KEY_FORMAT[unit]);
}

export function isoUtc(epochMs: number): string {
  return dayjs.utc(epochMs).toISOString();
}

export function utcMidnight(epochMs: number): number {
  return partitionStartOf(epochMs, "day");
}
