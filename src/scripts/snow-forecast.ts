import { SqliteResolvedResortCache, SqliteResortDirectoryCache } from "../lib/cache";
import { config } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { buildForecastDocuments, SqliteForecastIndex } from "../lib/forecast-index";
import { createLogger } from "../lib/logger";
import { collectResortForecasts, toForecastSet, type PipelineDeps } from "../lib/pipeline";
import { forecastSetToJson, formatForecastReport, formatIndexedDocuments } from "../lib/report";
import { fetchCountries } from "../lib/scraping/directory";
import { createSnowForecastSource } from "../lib/scraping/snow-forecast";
import { fetchPage } from "../lib/scraping/utils";
import { loadWatchlist } from "../lib/watchlist";

interface CliOptions {
  command: "forecast" | "countries" | "latest";
  configPath: string;
  index: boolean;
  useCache: boolean;
  json: boolean;
  region: string;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    command: "forecast",
    configPath: config.watchlistPath,
    index: false,
    useCache: true,
    json: false,
    region: "europe",
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "countries" || arg === "forecast" || arg === "latest") {
      options.command = arg;
    } else if (arg === "--config" && args[i + 1]) {
      options.configPath = args[i + 1];
      i++;
    } else if (arg === "--region" && args[i + 1]) {
      options.region = args[i + 1];
      i++;
    } else if (arg === "--index") {
      options.index = true;
    } else if (arg === "--no-cache") {
      options.useCache = false;
    } else if (arg === "--json") {
      options.json = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function listCountries(options: CliOptions): Promise<number> {
  const logger = createLogger("countries", { level: config.logLevel });
  const countries = await fetchCountries({ fetchPage, logger, region: options.region });
  for (const country of countries) {
    console.log(`${country.name}\t${country.url}`);
  }
  return 0;
}

function listLatest(): number {
  console.log(formatIndexedDocuments(new SqliteForecastIndex(getDb()).latest()));
  return 0;
}

async function forecast(options: CliOptions): Promise<number> {
  const logger = createLogger("forecast", { level: config.logLevel });
  logger.info("==== Starting new run ====");

  const watchlist = loadWatchlist(options.configPath);
  const deps: PipelineDeps = {
    source: createSnowForecastSource({
      fetchPage,
      logger: createLogger("snow-forecast", { level: config.logLevel }),
    }),
    logger,
  };
  if (options.useCache) {
    const db = getDb();
    deps.directoryCache = new SqliteResortDirectoryCache(db, { ttlMs: config.directoryCacheTtlMs });
    deps.resolvedCache = new SqliteResolvedResortCache(db);
  }

  const forecasts = await collectResortForecasts(watchlist, deps);
  const set = toForecastSet(forecasts);
  console.log(options.json ? forecastSetToJson(set) : formatForecastReport(set));

  if (!options.index) return 0;

  try {
    const written = new SqliteForecastIndex(getDb()).bulkIndex(buildForecastDocuments(forecasts));
    logger.info(`Indexed ${written} forecast documents`);
    return 0;
  } catch (err) {
    logger.error("Indexing failed:", err instanceof Error ? err.message : err);
    return 1;
  }
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  let code: number;
  switch (options.command) {
    case "countries":
      code = await listCountries(options);
      break;
    case "latest":
      code = listLatest();
      break;
    default:
      code = await forecast(options);
  }
  closeDb();
  process.exit(code);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  closeDb();
  process.exit(1);
});
