// apps/downloader/src/normalize.ts
import { dataTypeSpec } from "./dataTypes.js";
import { log } from "./logger.js";
import type { DataType, MarketRecord } from "./types.js";

export function compareRecords(keyOf: (r: MarketRecord) => string) {
  return (a: MarketRecord, b: MarketRecord): number => {
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    if (a.symbol !== b.symbol) return a.symbol < b.symbol ? -1 : 1;
    const ka = keyOf(a);
    const kb = keyOf(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  };
}

/** Raw page -> canonical records, sorted. Rows that fail validation are dropped. */
export function normalize(dataType: DataType, rawPage: readonly unknown[], symbol: string): MarketRecord[] {
  const spec = dataTypeSpec(dataType);
  const out: MarketRecord[] = [];
  let dropped = 0;

  for (const raw of rawPage) {
    const r = spec.normalizeRow(raw, symbol);
    if (r) out.push(r);
    else dropped += 1;
  }

  if (dropped > 0) log.debug(`[normalize] dropped invalid rows`, { dataType, symbol, dropped, kept: out.length });
  return out.sort(compareRecords(spec.keyOf));
}

/**
 * Merge two record sets, one record per dedup key. On a key collision the
 * incoming record wins. Output is sorted by timestamp ascending.
 */
export function dedup(
  dataType: DataType,
  existing: readonly MarketRecord[],
  incoming: readonly MarketRecord[]
): MarketRecord[] {
  const spec = dataTypeSpec(dataType);
  const byKey = new Map<string, MarketRecord>();
  for (const r of existing) byKey.set(spec.keyOf(r), r);
  for (const r of incoming) byKey.set(spec.keyOf(r), r);
  return Array.from(byKey.values()).sort(compareRecords(spec.keyOf));
}
