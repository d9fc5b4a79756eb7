// apps/downloader/src/store/PartitionStore.ts
import path from "node:path";
import type { DataType, MarketRecord, PartitionHeader, PartitionRef, PartitionStatus, WriteMeta } from "../types.js";

export interface PartitionStore {
  status(ref: PartitionRef): Promise<PartitionStatus>;
  /** null when the partition does not exist */
  header(ref: PartitionRef): Promise<PartitionHeader | null>;
  /** @throws NotFoundError when the partition does not exist */
  read(ref: PartitionRef): Promise<MarketRecord[]>;
  /** Replaces the partition in one step. Records must be non-empty. */
  write(ref: PartitionRef, records: readonly MarketRecord[], meta: WriteMeta): Promise<void>;
  listSymbols(exchange: string, dataType: DataType, subTypeId: string): Promise<string[]>;
}

export const PARTITION_EXT = ".parquet";

// "BTC/USDT:USDT" -> "BTC%2FUSDT%3AUSDT"
export function encodeSegment(s: string): string {
  return encodeURIComponent(s);
}

export function seriesDir(baseDir: string, exchange: string, dataType: DataType, subTypeId: string): string {
  return path.join(baseDir, encodeSegment(exchange), dataType, encodeSegment(subTypeId));
}

export function partitionPath(baseDir: string, ref: PartitionRef): string {
  return path.join(
    seriesDir(baseDir, ref.exchange, ref.dataType, ref.subTypeId),
    encodeSegment(ref.symbol),
    `${ref.partitionKey}${PARTITION_EXT}`
  );
}

export function statusOf(header: PartitionHeader | null): PartitionStatus {
  if (!header) return "absent";
  return header.complete ? "complete" : "incomplete";
}

export function refLabel(ref: PartitionRef): string {
  return `${ref.exchange}/${ref.dataType}/${ref.subTypeId}/${ref.symbol}/${ref.partitionKey}`;
}
