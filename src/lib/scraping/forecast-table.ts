import * as cheerio from "cheerio";
import { config } from "../config";
import type { Logger } from "../logger";
import type { ForecastPeriod, GeoPoint, MeasurementKey, PageFetcher } from "../types";
import { absoluteUrl, normalizeText } from "./utils";

// Shown in the snow row when no snow is forecast
const NO_SNOW_PLACEHOLDER = "—";

/** A column is null when its row is missing from the table. */
export type MeasurementColumns = Record<MeasurementKey, readonly string[] | null>;

/** Value at `index`, or null when the column is missing or too short. */
export function cellAt(column: readonly string[] | null, index: number): string | null {
  if (column === null) return null;
  if (index >= column.length) return null;
  return column[index];
}

/**
 * Zip the time slots with the date sequence and the measurement columns by
 * position. `times` decides the period count; every other sequence pads with
 * null.
 */
export function alignPeriods(
  dates: readonly (string | null)[],
  times: readonly string[],
  columns: MeasurementColumns
): ForecastPeriod[] {
  return times.map((time, i) => ({
    date: i < dates.length ? dates[i] : null,
    time,
    snow: cellAt(columns.snow, i),
    freezingLevel: cellAt(columns.freezingLevel, i),
    humidity: cellAt(columns.humidity, i),
    wind: cellAt(columns.wind, i),
  }));
}

function parseColspan(raw: string | undefined): number {
  const n = raw ? parseInt(raw, 10) : 1;
  return isNaN(n) || n < 1 ? 1 : n;
}

/**
 * Expand the days header into one date per time slot: each day cell's
 * `data-date` is repeated `colspan` times.
 */
export function expandDates(
  cells: { date: string | null; colspan: number }[]
): (string | null)[] {
  const dates: (string | null)[] = [];
  for (const cell of cells) {
    for (let i = 0; i < cell.colspan; i++) dates.push(cell.date);
  }
  return dates;
}

export function extractForecast(
  $: cheerio.CheerioAPI,
  logger: Logger
): ForecastPeriod[] | null {
  const table = $("table.forecast-table__table").first();
  if (!table.length) {
    logger.error("Forecast table not found");
    return null;
  }

  const row = (name: string) => table.find(`tr[data-row="${name}"]`).first();

  const daysRow = row("days");
  const timeRow = row("time");

  if (!daysRow.length) logger.error("Days row not found");
  if (!timeRow.length) logger.error("Time row not found");
  if (!daysRow.length || !timeRow.length) return [];

  const dayCells = daysRow
    .find("td.forecast-table-days__cell")
    .toArray()
    .map((el) => ({
      date: $(el).attr("data-date") ?? null,
      colspan: parseColspan($(el).attr("colspan")),
    }));
  if (dayCells.length === 0) logger.error("Day cells not found");
  else logger.debug(`Found ${dayCells.length} day cells`);
  const dates = expandDates(dayCells);

  const times = timeRow
    .find("td.forecast-table__cell")
    .toArray()
    .map((el) => normalizeText($(el).text()));
  if (times.length === 0) logger.error("Time cells not found");
  else logger.debug(`Found ${times.length} time cells`);

  const readRow = (name: string): string[] | null => {
    const measurementRow = row(name);
    if (!measurementRow.length) {
      logger.info(`No ${name} row found`);
      return null;
    }
    return measurementRow
      .find("td")
      .toArray()
      .map((el) => normalizeText($(el).text()));
  };

  const snow = readRow("snow");
  const columns: MeasurementColumns = {
    snow: snow && snow.map((v) => (v === NO_SNOW_PLACEHOLDER ? "0" : v)),
    freezingLevel: readRow("freezing-level"),
    humidity: readRow("humidity"),
    wind: readRow("wind"),
  };
  logger.debug(`Snow data after cleaning: ${JSON.stringify(columns.snow)}`);

  return alignPeriods(dates, times, columns);
}

/** Reads `<meta name="geo.position" content="lat;lon">` when the page has one. */
export function extractLocation($: cheerio.CheerioAPI): GeoPoint | null {
  const content = $('meta[name="geo.position"]').attr("content");
  if (!content) return null;
  const [lat, lon] = content.split(/[;,]/).map((part) => parseFloat(part.trim()));
  if (lat === undefined || lon === undefined || isNaN(lat) || isNaN(lon)) return null;
  return { lat, lon };
}

export interface ForecastPage {
  periods: ForecastPeriod[] | null;
  location: GeoPoint | null;
}

export async function fetchResortForecast(
  dataUrl: string,
  deps: { fetchPage: PageFetcher; logger: Logger; baseUrl?: string; userAgent?: string }
): Promise<ForecastPage> {
  const { baseUrl = config.baseUrl, userAgent = config.userAgent } = deps;
  const url = absoluteUrl(baseUrl, dataUrl);
  deps.logger.debug(`Fetching forecast from ${url}`);

  const html = await deps.fetchPage(url, { headers: { "User-Agent": userAgent } });
  const $ = cheerio.load(html);
  return {
    periods: extractForecast($, deps.logger),
    location: extractLocation($),
  };
}
