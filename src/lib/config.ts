import type { LogLevel } from "./logger";

function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return raw;
    default:
      return "info";
  }
}

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = parseInt(raw, 10);
  return isNaN(n) ? undefined : n;
}

export const config = {
  baseUrl: process.env.SNOW_FORECAST_BASE_URL || "https://www.snow-forecast.com",
  userAgent: process.env.SNOW_FORECAST_USER_AGENT || "Mozilla/5.0",
  watchlistPath: process.env.WATCHLIST_PATH || "resorts.yaml",
  dbPath: process.env.DB_PATH || "data/snow-forecast.db",
  directoryCacheTtlMs: parseInt(process.env.DIRECTORY_CACHE_TTL_MS || String(24 * 60 * 60 * 1000), 10),
  httpTimeoutMs: parseOptionalInt(process.env.HTTP_TIMEOUT_MS),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
