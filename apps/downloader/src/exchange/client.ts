// apps/downloader/src/exchange/client.ts
import type { DataType } from "../types.js";

export type PageRequest = {
  exchange: string;
  dataType: DataType;
  subTypeId: string;
  symbol: string;
  /** epoch ms; rows at or after this instant */
  since: number;
  limit: number;
};

/**
 * Remote market-data API. Pages come back oldest first, in the raw shapes
 * the normalizer accepts (see schemas.ts). Implementations fail with
 * RateLimitedError / NetworkError for conditions worth retrying.
 */
export interface MarketDataClient {
  listSymbols(exchange: string): Promise<string[]>;
  /**
   * Largest page this client serves for a data type. The fetcher never asks
   * for more, so a shorter page means the data ran out. Without it a short
   * page is not trusted and paging goes on until an empty page or the window end.
   */
  pageLimit?(dataType: DataType): number;
  fetchPage(req: PageRequest, opts?: { signal?: AbortSignal }): Promise<unknown[]>;
}
