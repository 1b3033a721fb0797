import type { ResolvedResortCache, ResortDirectoryCache } from "./cache";
import type { Logger } from "./logger";
import { matchResort } from "./matcher";
import { toWatchEntries } from "./watchlist";
import type { ForecastPage } from "./scraping/forecast-table";
import type {
  ForecastSet,
  ResolvedResort,
  ResortForecast,
  ResortListing,
  WatchEntry,
  Watchlist,
} from "./types";

export interface ForecastSource {
  fetchResortDirectory(country: string): Promise<ResortListing[]>;
  fetchResortForecast(dataUrl: string): Promise<ForecastPage>;
}

export interface PipelineDeps {
  source: ForecastSource;
  logger: Logger;
  directoryCache?: ResortDirectoryCache;
  resolvedCache?: ResolvedResortCache;
}

/**
 * Resolve each watch-list entry and scrape its forecast, one resort at a
 * time: countries in watch-list order, resorts in the order listed.
 * Unmatched entries and resorts without forecast data are left out.
 */
export async function collectResortForecasts(
  watchlist: Watchlist,
  deps: PipelineDeps
): Promise<ResortForecast[]> {
  const { source, logger, directoryCache, resolvedCache } = deps;
  const results: ResortForecast[] = [];
  const directories = new Map<string, ResortListing[]>();

  const getDirectory = async (country: string): Promise<ResortListing[]> => {
    const known = directories.get(country);
    if (known) return known;

    const cached = directoryCache?.load(country) ?? null;
    if (cached) {
      logger.debug(`Using cached directory for ${country} (${cached.length} resorts)`);
      directories.set(country, cached);
      return cached;
    }
    const fetched = await source.fetchResortDirectory(country);
    directoryCache?.save(country, fetched);
    directories.set(country, fetched);
    return fetched;
  };

  for (const entry of toWatchEntries(watchlist)) {
    const resort = await resolve(entry, () => getDirectory(entry.country), resolvedCache);
    if (!resort) {
      logger.warn(`No matching resort found for ${entry.resortName} in ${entry.country}`);
      continue;
    }
    logger.info(
      `Found matching resort for ${entry.resortName}: ${resort.name} (${resort.url}, ${resort.dataUrl})`
    );

    const { periods, location } = await source.fetchResortForecast(resort.dataUrl);
    if (!periods || periods.length === 0) {
      logger.warn(`No forecast data for ${resort.name}`);
      continue;
    }
    results.push({ resort, location, periods });
  }

  return results;
}

async function resolve(
  entry: WatchEntry,
  getDirectory: () => Promise<ResortListing[]>,
  resolvedCache: ResolvedResortCache | undefined
): Promise<ResolvedResort | null> {
  const cached = resolvedCache?.load(entry) ?? null;
  if (cached) return cached;

  const resort = matchResort(entry.country, entry.resortName, await getDirectory());
  if (resort) resolvedCache?.save(entry, resort);
  return resort;
}

export async function runForecast(
  watchlist: Watchlist,
  deps: PipelineDeps
): Promise<ForecastSet> {
  const forecasts = await collectResortForecasts(watchlist, deps);
  return toForecastSet(forecasts);
}

export function toForecastSet(forecasts: readonly ResortForecast[]): ForecastSet {
  const set: ForecastSet = new Map();
  for (const { resort, periods } of forecasts) {
    set.set(resort.name, periods);
  }
  return set;
}
