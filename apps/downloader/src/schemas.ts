// apps/downloader/src/schemas.ts
import { z } from "zod";

// numbers arrive as JSON numbers or numeric strings ("27031.5")
const Num = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

// parquet INT64 columns may come back as bigint
const Int = z.union([z.number(), z.bigint()]).transform((v) => Number(v)).pipe(z.number().finite());

// ─── raw page rows (MarketDataClient contract) ───────────────

/** [timestamp, open, high, low, close, volume, ...exchange extras] */
export const RawCandleSchema = z.tuple([Num, Num, Num, Num, Num, Num]).rest(z.unknown());

export const RawTradeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).nullish(),
  timestamp: Num,
  price: Num,
  amount: Num,
  side: z.enum(["buy", "sell"]).nullish(),
  cost: Num.nullish()
});

export const RawFundingSchema = z.object({
  timestamp: Num,
  fundingRate: Num,
  markPrice: Num.nullish()
});

export type RawCandle = z.infer<typeof RawCandleSchema>;
export type RawTrade = z.infer<typeof RawTradeSchema>;
export type RawFunding = z.infer<typeof RawFundingSchema>;

// ─── rows read back from a partition file ────────────────────

export const StoredCandleSchema = z.object({
  timestamp: Int,
  symbol: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number()
});

export const StoredTradeSchema = z.object({
  timestamp: Int,
  symbol: z.string(),
  id: z.string().nullish(),
  side: z.enum(["buy", "sell"]).nullish(),
  price: z.number(),
  amount: z.number(),
  cost: z.number()
});

export const StoredFundingSchema = z.object({
  timestamp: Int,
  symbol: z.string(),
  fundingRate: z.number(),
  markPrice: z.number().nullish()
});
