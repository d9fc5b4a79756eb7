// apps/downloader/src/dataTypes.ts
import { PlanningError } from "./errors.js";
import { RawCandleSchema, RawFundingSchema, RawTradeSchema } from "./schemas.js";
import { TIMEFRAMES, isTimeframe, tfPartitionUnit, tfToMs } from "./timeframes.js";
import type { DataType, MarketRecord, PartitionUnit, Timeframe } from "./types.js";

/**
 * Everything that differs between data types. Selected by the DataType tag;
 * the engine never branches on the data type itself.
 */
export type DataTypeSpec = {
  kind: DataType;
  subTypes: readonly string[];
  defaultSubType: string;
  /** max rows asked for per page */
  pageLimit: number;
  partitionUnit(subTypeId: string): PartitionUnit;
  /** page size for a request starting at `cursor` */
  limitFor(subTypeId: string, cursor: number, windowEnd: number): number;
  /** cursor for the page after one whose last row is at `lastTimestamp` */
  nextCursor(subTypeId: string, lastTimestamp: number, cursor: number): number;
  /** where to continue after an empty page; paging ends once this reaches the window end */
  advanceOnEmpty(subTypeId: string, cursor: number, limit: number): number;
  normalizeRow(raw: unknown, symbol: string): MarketRecord | null;
  /** dedup key inside one partition */
  keyOf(r: MarketRecord): string;
};

function asTimeframe(subTypeId: string): Timeframe {
  if (!isTimeframe(subTypeId)) throw new PlanningError(`Unsupported timeframe: ${subTypeId}`);
  return subTypeId;
}

function only(kind: DataType, expected: string, subTypeId: string): void {
  if (subTypeId !== expected) throw new PlanningError(`Unsupported ${kind} sub-type: ${subTypeId}`);
}

const PAGE_LIMIT = 1000;

const HOUR_MS = 3_600_000;

// how far an empty page moves the cursor when rows are not on a fixed grid
const TRADE_EMPTY_STEP_MS = HOUR_MS;
const FUNDING_EMPTY_STEP_MS = 8 * HOUR_MS;

const byTimestampSymbol = (r: MarketRecord) => `${r.timestamp}|${r.symbol}`;

const candles: DataTypeSpec = {
  kind: "candles",
  subTypes: TIMEFRAMES,
  defaultSubType: "1m",
  pageLimit: PAGE_LIMIT,
  partitionUnit: (subTypeId) => tfPartitionUnit(asTimeframe(subTypeId)),
  limitFor(subTypeId, cursor, windowEnd) {
    const left = Math.ceil((windowEnd - cursor) / tfToMs(asTimeframe(subTypeId)));
    return Math.max(1, Math.min(PAGE_LIMIT, left));
  },
  // one candle further: the next slot that can hold a candle
  nextCursor: (subTypeId, lastTimestamp) => lastTimestamp + tfToMs(asTimeframe(subTypeId)),
  // no candles in [cursor, cursor + limit * tf): skip that span
  advanceOnEmpty: (subTypeId, cursor, limit) => cursor + limit * tfToMs(asTimeframe(subTypeId)),
  normalizeRow(raw, symbol) {
    const r = RawCandleSchema.safeParse(raw);
    if (!r.success) return null;
    const [timestamp, open, high, low, close, volume] = r.data;
    return { kind: "candle", timestamp, symbol, open, high, low, close, volume };
  },
  keyOf: byTimestampSymbol
};

const trades: DataTypeSpec = {
  kind: "trades",
  subTypes: ["all"],
  defaultSubType: "all",
  pageLimit: PAGE_LIMIT,
  partitionUnit(subTypeId) {
    only("trades", "all", subTypeId);
    return "day";
  },
  limitFor: () => PAGE_LIMIT,
  // several trades can share the last millisecond; re-request it and let dedup drop the overlap
  nextCursor: (_subTypeId, lastTimestamp, cursor) => (lastTimestamp > cursor ? lastTimestamp : lastTimestamp + 1),
  // a quiet hour; the next page starts after it
  advanceOnEmpty: (_subTypeId, cursor) => cursor + TRADE_EMPTY_STEP_MS,
  normalizeRow(raw, symbol) {
    const r = RawTradeSchema.safeParse(raw);
    if (!r.success) return null;
    const t = r.data;
    return {
      kind: "trade",
      timestamp: t.timestamp,
      symbol,
      id: t.id ?? null,
      side: t.side ?? null,
      price: t.price,
      amount: t.amount,
      cost: t.cost ?? t.price * t.amount
    };
  },
  keyOf: (r) => (r.kind === "trade" && r.id != null ? `${r.timestamp}|${r.symbol}|${r.id}` : byTimestampSymbol(r))
};

const funding: DataTypeSpec = {
  kind: "funding",
  subTypes: ["rate"],
  defaultSubType: "rate",
  pageLimit: PAGE_LIMIT,
  partitionUnit(subTypeId) {
    only("funding", "rate", subTypeId);
    return "month";
  },
  limitFor: () => PAGE_LIMIT,
  nextCursor: (_subTypeId, lastTimestamp) => lastTimestamp + 1,
  // one funding interval
  advanceOnEmpty: (_subTypeId, cursor) => cursor + FUNDING_EMPTY_STEP_MS,
  normalizeRow(raw, symbol) {
    const r = RawFundingSchema.safeParse(raw);
    if (!r.success) return null;
    return {
      kind: "funding",
      timestamp: r.data.timestamp,
      symbol,
      fundingRate: r.data.fundingRate,
      markPrice: r.data.markPrice ?? null
    };
  },
  keyOf: byTimestampSymbol
};

export const DATA_TYPES: Record<DataType, DataTypeSpec> = { candles, trades, funding };

export function isDataType(v: string): v is DataType {
  return v === "candles" || v === "trades" || v === "funding";
}

export function dataTypeSpec(dataType: DataType): DataTypeSpec {
  return DATA_TYPES[dataType];
}

/** Throws PlanningError for a sub-type the data type does not know. */
export function validateSubType(dataType: DataType, subTypeId: string): void {
  DATA_TYPES[dataType].partitionUnit(subTypeId);
}
