// apps/downloader/src/types.ts
export type DataType = "candles" | "trades" | "funding";

export type Timeframe =
  | "1m"
  | "3m"
  | "5m"
  | "15m"
  | "30m"
  | "1h"
  | "2h"
  | "4h"
  | "6h"
  | "8h"
  | "12h"
  | "1d";

// calendar unit a partition spans (UTC)
export type PartitionUnit = "day" | "month" | "year";

export type Candle = {
  kind: "candle";
  timestamp: number; // epoch ms (open time)
  symbol: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type TradeSide = "buy" | "sell";

export type Trade = {
  kind: "trade";
  timestamp: number;
  symbol: string;
  id: string | null;
  side: TradeSide | null;
  price: number;
  amount: number;
  cost: number;
};

export type FundingRate = {
  kind: "funding";
  timestamp: number;
  symbol: string;
  fundingRate: number;
  markPrice: number | null;
};

export type MarketRecord = Candle | Trade | FundingRate;

export type Window = {
  partitionKey: string;
  start: number; // inclusive, epoch ms
  end: number; // exclusive
  partitionStart: number;
  partitionEnd: number;
};

export type PartitionRef = {
  exchange: string;
  dataType: DataType;
  subTypeId: string;
  symbol: string;
  partitionKey: string;
};

export type PartitionStatus = "absent" | "complete" | "incomplete";

export type PartitionHeader = {
  exchange: string;
  symbol: string;
  dataType: DataType;
  subTypeId: string;
  partitionKey: string;
  complete: boolean;
  coverageStart: number;
  coverageEnd: number;
  writtenAt: number;
  recordCount: number;
};

export type WriteMeta = {
  complete: boolean;
  coverageStart: number;
  coverageEnd: number;
};

export type DateInput = string | number | Date;

export type RateLimitConfig = {
  maxRequests: number;
  intervalMs: number;
};

export type WindowStatus = "fetched" | "skipped" | "failed" | "empty" | "cancelled";

export type WindowOutcome = {
  exchange: string;
  dataType: DataType;
  subTypeId: string;
  symbol: string;
  window: Window;
  status: WindowStatus;
  records: number;
  complete?: boolean;
  error?: Error;
  warning?: Error;
};

export type DownloadSummary = {
  fetched: number;
  skipped: number;
  failed: number;
  empty: number;
  cancelled: number;
  warnings: number;
  outcomes: WindowOutcome[];
};
