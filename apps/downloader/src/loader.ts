// apps/downloader/src/loader.ts
import { dedup } from "./normalize.js";
import { plan } from "./planner.js";
import type { PartitionStore } from "./store/PartitionStore.js";
import type { DataType, MarketRecord } from "./types.js";

/**
 * Reads cached records in [start, end) back from the store. Partitions that
 * were never written are skipped. Without `symbols`, every symbol the store
 * holds for the series is read. No network access.
 */
export async function loadRecords(
  store: PartitionStore,
  exchange: string,
  dataType: DataType,
  subTypeId: string,
  symbols: readonly string[] | undefined,
  start: number,
  end: number
): Promise<MarketRecord[]> {
  // planning against end itself: loading is not bounded by the clock
  const windows = plan(dataType, subTypeId, start, end, end);
  const names = symbols ?? (await store.listSymbols(exchange, dataType, subTypeId));

  const out: MarketRecord[] = [];
  for (const symbol of names) {
    for (const w of windows) {
      const ref = { exchange, dataType, subTypeId, symbol, partitionKey: w.partitionKey };
      if ((await store.status(ref)) === "absent") continue;
      for (const r of await store.read(ref)) {
        if (r.timestamp >= start && r.timestamp < end) out.push(r);
      }
    }
  }
  return dedup(dataType, [], out);
}
