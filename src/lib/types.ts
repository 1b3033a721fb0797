// ===== Directory =====

export interface Country {
  name: string;
  url: string;
}

export interface ResortListing {
  name: string;
  url: string; // canonical detail page, e.g. "/resorts/Engelberg"
  dataUrl: string; // forecast page, e.g. "/resorts/Engelberg/6day/mid"
}

// ===== Watch-list =====

/** Country identifier → resort display names, in file order. */
export type Watchlist = Record<string, string[]>;

export interface WatchEntry {
  country: string;
  resortName: string;
}

export interface ResolvedResort {
  name: string;
  country: string;
  url: string;
  dataUrl: string;
}

// ===== Forecast =====

export interface ForecastPeriod {
  date: string | null;
  time: string;
  snow: string | null; // "0" when the site shows the em-dash placeholder
  freezingLevel: string | null;
  humidity: string | null;
  wind: string | null;
}

export type MeasurementKey = "snow" | "freezingLevel" | "humidity" | "wind";

export type ForecastSet = Map<string, ForecastPeriod[]>;

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface ResortForecast {
  resort: ResolvedResort;
  location: GeoPoint | null;
  periods: ForecastPeriod[];
}

// ===== Indexing =====

export interface ForecastDocument {
  name: string;
  country: string;
  location: GeoPoint | null;
  forecast: ForecastPeriod[];
  totalSnow: number;
  timestamp: string;
}

// ===== Collaborators =====

export type PageFetcher = (
  url: string,
  options?: { headers?: Record<string, string> }
) => Promise<string>;
