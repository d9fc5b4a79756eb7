// apps/downloader/src/store/ParquetPartitionStore.ts
import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { z } from "zod";
import { NotFoundError, StoreIOError } from "../errors.js";
import { log } from "../logger.js";
import { StoredCandleSchema, StoredFundingSchema, StoredTradeSchema } from "../schemas.js";
import type { DataType, MarketRecord, PartitionHeader, PartitionRef, PartitionStatus, WriteMeta } from "../types.js";
import { PARTITION_EXT, type PartitionStore, partitionPath, refLabel, seriesDir, statusOf } from "./PartitionStore.js";

const HEADER_KEY = "market_cache.header";

const SCHEMAS: Record<DataType, ParquetSchema> = {
  candles: new ParquetSchema({
    timestamp: { type: "INT64", compression: "GZIP" },
    symbol: { type: "UTF8", compression: "GZIP" },
    open: { type: "DOUBLE", compression: "GZIP" },
    high: { type: "DOUBLE", compression: "GZIP" },
    low: { type: "DOUBLE", compression: "GZIP" },
    close: { type: "DOUBLE", compression: "GZIP" },
    volume: { type: "DOUBLE", compression: "GZIP" }
  }),
  trades: new ParquetSchema({
    timestamp: { type: "INT64", compression: "GZIP" },
    symbol: { type: "UTF8", compression: "GZIP" },
    id: { type: "UTF8", optional: true, compression: "GZIP" },
    side: { type: "UTF8", optional: true, compression: "GZIP" },
    price: { type: "DOUBLE", compression: "GZIP" },
    amount: { type: "DOUBLE", compression: "GZIP" },
    cost: { type: "DOUBLE", compression: "GZIP" }
  }),
  funding: new ParquetSchema({
    timestamp: { type: "INT64", compression: "GZIP" },
    symbol: { type: "UTF8", compression: "GZIP" },
    fundingRate: { type: "DOUBLE", compression: "GZIP" },
    markPrice: { type: "DOUBLE", optional: true, compression: "GZIP" }
  })
};

const HeaderSchema = z.object({
  exchange: z.string(),
  symbol: z.string(),
  dataType: z.enum(["candles", "trades", "funding"]),
  subTypeId: z.string(),
  partitionKey: z.string(),
  complete: z.boolean(),
  coverageStart: z.number(),
  coverageEnd: z.number(),
  writtenAt: z.number(),
  recordCount: z.number().int().nonnegative()
});

type Row = Record<string, string | number | bigint>;

// optional columns are left out of the row rather than set to null
function toRow(r: MarketRecord): Row {
  switch (r.kind) {
    case "candle":
      return {
        timestamp: BigInt(r.timestamp),
        symbol: r.symbol,
        open: r.open,
        high: r.high,
        low: r.low,
        close: r.close,
        volume: r.volume
      };
    case "trade": {
      const row: Row = {
        timestamp: BigInt(r.timestamp),
        symbol: r.symbol,
        price: r.price,
        amount: r.amount,
        cost: r.cost
      };
      if (r.id != null) row.id = r.id;
      if (r.side != null) row.side = r.side;
      return row;
    }
    case "funding": {
      const row: Row = { timestamp: BigInt(r.timestamp), symbol: r.symbol, fundingRate: r.fundingRate };
      if (r.markPrice != null) row.markPrice = r.markPrice;
      return row;
    }
  }
}

function fromRow(dataType: DataType, raw: unknown): MarketRecord {
  switch (dataType) {
    case "candles":
      return { kind: "candle", ...StoredCandleSchema.parse(raw) };
    case "trades": {
      const t = StoredTradeSchema.parse(raw);
      return { kind: "trade", ...t, id: t.id ?? null, side: t.side ?? null };
    }
    case "funding": {
      const f = StoredFundingSchema.parse(raw);
      return { kind: "funding", ...f, markPrice: f.markPrice ?? null };
    }
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * One parquet file per partition under
 * `<baseDir>/<exchange>/<dataType>/<subTypeId>/<symbol>/<partitionKey>.parquet`.
 * Completeness and coverage live in the file's key-value metadata, so a
 * partition and its flag are always replaced together.
 */
export class ParquetPartitionStore implements PartitionStore {
  constructor(private readonly baseDir: string, private readonly clock: () => number = Date.now) {}

  async status(ref: PartitionRef): Promise<PartitionStatus> {
    return statusOf(await this.header(ref));
  }

  async header(ref: PartitionRef): Promise<PartitionHeader | null> {
    const file = partitionPath(this.baseDir, ref);
    let reader: ParquetReader;
    try {
      reader = await ParquetReader.openFile(file);
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new StoreIOError(`cannot open partition ${refLabel(ref)}`, file, { cause: e });
    }

    try {
      const raw = reader.getMetadata()[HEADER_KEY];
      if (raw == null) throw new Error(`missing ${HEADER_KEY} metadata`);
      return HeaderSchema.parse(JSON.parse(String(raw)));
    } catch (e) {
      throw new StoreIOError(`bad partition header ${refLabel(ref)}`, file, { cause: e });
    } finally {
      await reader.close();
    }
  }

  async read(ref: PartitionRef): Promise<MarketRecord[]> {
    const file = partitionPath(this.baseDir, ref);
    let reader: ParquetReader;
    try {
      reader = await ParquetReader.openFile(file);
    } catch (e) {
      if (isNotFound(e)) throw new NotFoundError(ref);
      throw new StoreIOError(`cannot open partition ${refLabel(ref)}`, file, { cause: e });
    }

    try {
      const out: MarketRecord[] = [];
      const cursor = reader.getCursor();
      for (let row: unknown = await cursor.next(); row != null; row = await cursor.next()) {
        out.push(fromRow(ref.dataType, row));
      }
      return out;
    } catch (e) {
      throw new StoreIOError(`cannot read partition ${refLabel(ref)}`, file, { cause: e });
    } finally {
      await reader.close();
    }
  }

  async write(ref: PartitionRef, records: readonly MarketRecord[], meta: WriteMeta): Promise<void> {
    const file = partitionPath(this.baseDir, ref);
    if (records.length === 0) throw new StoreIOError(`refusing to write empty partition ${refLabel(ref)}`, file);

    const dir = path.dirname(file);
    const tmp = path.join(dir, `.${path.basename(file)}.${randomUUID()}.tmp`);
    const header: PartitionHeader = {
      exchange: ref.exchange,
      symbol: ref.symbol,
      dataType: ref.dataType,
      subTypeId: ref.subTypeId,
      partitionKey: ref.partitionKey,
      complete: meta.complete,
      coverageStart: meta.coverageStart,
      coverageEnd: meta.coverageEnd,
      writtenAt: this.clock(),
      recordCount: records.length
    };

    try {
      await fs.mkdir(dir, { recursive: true });
      const writer = await ParquetWriter.openFile(SCHEMAS[ref.dataType], tmp);
      writer.setMetadata(HEADER_KEY, JSON.stringify(header));
      try {
        for (const r of records) await writer.appendRow(toRow(r));
      } finally {
        await writer.close();
      }
      await fs.rename(tmp, file);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw new StoreIOError(`cannot write partition ${refLabel(ref)}`, file, { cause: e });
    }

    log.debug(`[store] wrote`, { partition: refLabel(ref), rows: records.length, complete: meta.complete });
  }

  async listSymbols(exchange: string, dataType: DataType, subTypeId: string): Promise<string[]> {
    const dir = seriesDir(this.baseDir, exchange, dataType, subTypeId);
    try {
      const dirents = await fs.readdir(dir, { withFileTypes: true });
      const symbols: string[] = [];
      for (const d of dirents) {
        if (!d.isDirectory()) continue;
        const files = await fs.readdir(path.join(dir, d.name));
        if (files.some((f) => f.endsWith(PARTITION_EXT) && !f.startsWith("."))) symbols.push(decodeURIComponent(d.name));
      }
      return symbols.sort();
    } catch (e) {
      if (isNotFound(e)) return [];
      throw new StoreIOError(`cannot list symbols`, dir, { cause: e });
    }
  }
}
