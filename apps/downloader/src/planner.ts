// apps/downloader/src/planner.ts
import { dataTypeSpec } from "./dataTypes.js";
import { partitionEndOf, partitionKeyOf, partitionStartOf } from "./time.js";
import type { DataType, Window } from "./types.js";

/**
 * Splits [start, end) into partition-aligned windows.
 *
 * `end` is clamped to `now`; an empty or inverted range plans to []. The first
 * window may start inside its partition and the last is cut at `end`, so the
 * windows cover exactly the requested range. Each window carries its full
 * partition bounds so callers can tell a partial window from a full one.
 */
export function plan(
  dataType: DataType,
  subTypeId: string,
  start: number,
  end: number,
  now: number = Date.now()
): Window[] {
  const unit = dataTypeSpec(dataType).partitionUnit(subTypeId);
  const stop = Math.min(end, now);
  if (!(start < stop)) return [];

  const out: Window[] = [];
  let cursor = start;
  while (cursor < stop) {
    const partitionStart = partitionStartOf(cursor, unit);
    const partitionEnd = partitionEndOf(cursor, unit);
    const windowEnd = Math.min(partitionEnd, stop);
    out.push({
      partitionKey: partitionKeyOf(partitionStart, unit),
      start: cursor,
      end: windowEnd,
      partitionStart,
      partitionEnd
    });
    cursor = windowEnd;
  }
  return out;
}

export function coversPartition(w: Pick<Window, "start" | "end" | "partitionStart" | "partitionEnd">): boolean {
  return w.start <= w.partitionStart && w.end >= w.partitionEnd;
}
