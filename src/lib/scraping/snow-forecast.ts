import { config } from "../config";
import type { Logger } from "../logger";
import type { ForecastSource } from "../pipeline";
import type { PageFetcher } from "../types";
import { fetchResortDirectory } from "./directory";
import { fetchResortForecast } from "./forecast-table";

export function createSnowForecastSource(deps: {
  fetchPage: PageFetcher;
  logger: Logger;
  baseUrl?: string;
  userAgent?: string;
}): ForecastSource {
  const { fetchPage, logger, baseUrl = config.baseUrl, userAgent = config.userAgent } = deps;
  return {
    fetchResortDirectory: (country) => fetchResortDirectory(country, { fetchPage, logger, baseUrl }),
    fetchResortForecast: (dataUrl) =>
      fetchResortForecast(dataUrl, { fetchPage, logger, baseUrl, userAgent }),
  };
}
