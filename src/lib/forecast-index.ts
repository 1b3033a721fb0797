import type Database from "better-sqlite3";
import type { ForecastDocument, ForecastPeriod, ResortForecast } from "./types";

/**
 * Numeric snow amount of a scraped cell. A trailing unit ("5cm", "2.5 cm") is
 * stripped; ranges like "5-10" and anything else non-numeric give null.
 */
export function parseSnowAmount(raw: string | null): number | null {
  if (raw === null) return null;
  const match = raw.trim().match(/^(\d+(?:\.\d+)?)\s*[a-z"]*$/i);
  if (!match) return null;
  return parseFloat(match[1]);
}

export function totalSnow(periods: readonly ForecastPeriod[]): number {
  return periods.reduce((sum, period) => sum + (parseSnowAmount(period.snow) ?? 0), 0);
}

export function buildForecastDocuments(
  forecasts: readonly ResortForecast[],
  now: Date = new Date()
): ForecastDocument[] {
  const timestamp = now.toISOString();
  return forecasts.map(({ resort, location, periods }) => ({
    name: resort.name,
    country: resort.country,
    location,
    forecast: periods,
    totalSnow: totalSnow(periods),
    timestamp,
  }));
}

export interface ForecastIndex {
  /** Store a batch of documents; returns how many were written. */
  bulkIndex(docs: readonly ForecastDocument[]): number;
  latest(): ForecastDocument[];
}

interface ForecastDocumentRow {
  name: string;
  country: string;
  timestamp: string;
  lat: number | null;
  lon: number | null;
  total_snow: number;
  forecast_json: string;
}

export class SqliteForecastIndex implements ForecastIndex {
  constructor(private readonly db: Database.Database) {}

  bulkIndex(docs: readonly ForecastDocument[]): number {
    const upsert = this.db.prepare(
      `INSERT OR REPLACE INTO forecast_documents
         (name, country, timestamp, lat, lon, total_snow, forecast_json)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );

    return this.db.transaction(() => {
      let written = 0;
      for (const doc of docs) {
        upsert.run(
          doc.name,
          doc.country,
          doc.timestamp,
          doc.location?.lat ?? null,
          doc.location?.lon ?? null,
          doc.totalSnow,
          JSON.stringify(doc.forecast)
        );
        written++;
      }
      return written;
    })();
  }

  /** Most recent document per resort, newest first. */
  latest(): ForecastDocument[] {
    const rows = this.db
      .prepare<[], ForecastDocumentRow>(
        `SELECT d.* FROM forecast_documents d
         JOIN (SELECT name, country, MAX(timestamp) AS ts FROM forecast_documents GROUP BY name, country) m
           ON d.name = m.name AND d.country = m.country AND d.timestamp = m.ts
         ORDER BY d.timestamp DESC, d.name`
      )
      .all();

    return rows.map((row) => ({
      name: row.name,
      country: row.country,
      location: row.lat !== null && row.lon !== null ? { lat: row.lat, lon: row.lon } : null,
      forecast: parseForecastJson(row.forecast_json),
      totalSnow: row.total_snow,
      timestamp: row.timestamp,
    }));
  }
}

function nullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function parseForecastJson(json: string): ForecastPeriod[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.flatMap((item: unknown) => {
    if (typeof item !== "object" || item === null) return [];
    const record = new Map(Object.entries(item));
    return [
      {
        date: nullableString(record.get("date")),
        time: nullableString(record.get("time")) ?? "",
        snow: nullableString(record.get("snow")),
        freezingLevel: nullableString(record.get("freezingLevel")),
        humidity: nullableString(record.get("humidity")),
        wind: nullableString(record.get("wind")),
      },
    ];
  });
}
