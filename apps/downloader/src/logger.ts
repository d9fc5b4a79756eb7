// apps/downloader/src/logger.ts
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(RANK, v);
}

const envLevel = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function on(level: LogLevel): boolean {
  return RANK[level] >= RANK[threshold];
}

function ts(): string {
  return new Date().toISOString();
}

export const log = {
  debug: (msg: string, meta?: unknown) => {
    if (on("debug")) console.log(`[${ts()}] [DEBUG] ${msg}`, meta ?? "");
  },
  info: (msg: string, meta?: unknown) => {
    if (on("info")) console.log(`[${ts()}] [INFO] ${msg}`, meta ?? "");
  },
  warn: (msg: string, meta?: unknown) => {
    if (on("warn")) console.warn(`[${ts()}] [WARN] ${msg}`, meta ?? "");
  },
  error: (msg: string, meta?: unknown) => {
    if (on("error")) console.error(`[${ts()}] [ERROR] ${msg}`, meta ?? "");
  }
};
