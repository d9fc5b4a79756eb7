// apps/downloader/src/index.ts
import "dotenv/config";

import { download } from "./api.js";
import { loadConfig } from "./config.js";
import { createClient } from "./exchange/factory.js";
import { log, setLogLevel } from "./logger.js";
import { isoUtc } from "./time.js";

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.logLevel);

  const client = createClient(cfg);
  const symbols = cfg.symbols ?? (await client.listSymbols(cfg.exchange));
  if (symbols.length === 0) throw new Error(`No symbols resolved for ${cfg.exchange}`);

  log.info(
    `[downloader] range start=${isoUtc(cfg.start)} end=${isoUtc(cfg.end)} exchange=${cfg.exchange} client=${cfg.client} types=${cfg.dataTypes.join(",")} symbols=${symbols.length}`
  );

  // Ctrl-C: let running windows commit, start nothing new
  const ac = new AbortController();
  process.once("SIGINT", () => {
    log.warn(`[downloader] SIGINT, finishing in-flight windows`);
    ac.abort();
  });

  const summary = await download(cfg.exchange, cfg.dataTypes, symbols, cfg.start, cfg.end, {
    client,
    dataDir: cfg.dataDir,
    candles: { timeframes: cfg.timeframes },
    rateLimit: cfg.rateLimit,
    concurrency: cfg.concurrency,
    pageTimeoutMs: cfg.pageTimeoutMs,
    retry: cfg.retry,
    completenessMarginMs: cfg.completenessMarginMs,
    signal: ac.signal
  });

  for (const o of summary.outcomes) {
    if (o.status === "failed") log.error(`[downloader] failed ${o.symbol} ${o.subTypeId} ${o.window.partitionKey}: ${o.error?.message ?? "unknown"}`);
  }

  if (summary.failed > 0) process.exitCode = 2;
}

main().catch((err) => {
  log.error(`[downloader] fatal`, err);
  process.exit(1);
});
