import type { ForecastDocument, ForecastPeriod, ForecastSet } from "./types";

function show(value: string | null): string {
  return value ?? "-";
}

export function formatPeriod(period: ForecastPeriod): string {
  return (
    `${show(period.date)} ${period.time}: ` +
    `Snow: ${show(period.snow)}, ` +
    `Freezing: ${show(period.freezingLevel)}, ` +
    `Humidity: ${show(period.humidity)}, ` +
    `Wind: ${show(period.wind)}`
  );
}

export function formatForecastReport(set: ForecastSet): string {
  const sections: string[] = [];
  for (const [name, periods] of set) {
    sections.push([`Forecast for ${name}:`, ...periods.map(formatPeriod)].join("\n"));
  }
  return sections.join("\n\n");
}

export function forecastSetToJson(set: ForecastSet): string {
  return JSON.stringify(Object.fromEntries(set), null, 2);
}

/** One line per stored resort: when it was indexed and its total snowfall. */
export function formatIndexedDocuments(docs: readonly ForecastDocument[]): string {
  if (docs.length === 0) return "No indexed forecasts";
  return docs
    .map((doc) => `${doc.timestamp} ${doc.name} (${doc.country}): ${doc.totalSnow} cm over ${doc.forecast.length} periods`)
    .join("\n");
}
