import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "fs";
import Database from "better-sqlite3";
import { collectResortForecasts, runForecast, toForecastSet, type ForecastSource } from "../lib/pipeline";
import { createSnowForecastSource } from "../lib/scraping/snow-forecast";
import { SqliteResolvedResortCache, SqliteResortDirectoryCache } from "../lib/cache";
import { initSchema } from "../lib/db";
import { silentLogger, type Logger } from "../lib/logger";
import type { ForecastPeriod, ResortListing } from "../lib/types";

const FORECAST_HTML = readFileSync(
  new URL("./fixtures/forecast-page.html", import.meta.url),
  "utf-8"
);

const BASE = "https://forecast.test";

const listing = (name: string): ResortListing => ({
  name,
  url: `/resorts/${name}`,
  dataUrl: `/resorts/${name}/6day/mid`,
});

const period = (time: string): ForecastPeriod => ({
  date: "2030-01-05",
  time,
  snow: "0",
  freezingLevel: null,
  humidity: null,
  wind: null,
});

function fakeSource(
  directories: Record<string, ResortListing[]>,
  forecasts: Record<string, ForecastPeriod[] | null>
) {
  const calls: string[] = [];
  const source: ForecastSource = {
    async fetchResortDirectory(country) {
      calls.push(`directory:${country}`);
      return directories[country] ?? [];
    },
    async fetchResortForecast(dataUrl) {
      calls.push(`forecast:${dataUrl}`);
      return { periods: forecasts[dataUrl] ?? null, location: null };
    },
  };
  return { source, calls };
}

function warnings(): Logger & { warned: string[] } {
  const warned: string[] = [];
  return { ...silentLogger, warned, warn: (message: string) => void warned.push(message) };
}

describe("runForecast", () => {
  it("keys the result by canonical name with one period per time slot", async () => {
    const pages: Record<string, string> = {
      [`${BASE}/countries/Switzerland/resorts/`]:
        '<table><tr class="digest-row" data-url="/resorts/Engelberg/6day/mid"><td><div class="name"><a href="/resorts/Engelberg">Engelberg</a></div></td></tr>' +
        '<tr class="digest-row" data-url="/resorts/Laax/6day/mid"><td><div class="name"><a href="/resorts/Laax">Laax</a></div></td></tr></table>',
      [`${BASE}/resorts/Engelberg/6day/mid`]: FORECAST_HTML,
    };
    const fetchPage = vi.fn(async (url: string) => {
      const page = pages[url];
      if (page === undefined) throw new Error(`unexpected ${url}`);
      return page;
    });
    const source = createSnowForecastSource({ fetchPage, logger: silentLogger, baseUrl: BASE });

    const result = await runForecast({ Switzerland: ["engelberg"] }, { source, logger: silentLogger });

    expect([...result.keys()]).toEqual(["Engelberg"]);
    expect(result.get("Engelberg")).toHaveLength(4);
  });

  it("produces no keys for an unmatched entry and logs a warning", async () => {
    const { source, calls } = fakeSource({ Switzerland: [listing("Engelberg")] }, {});
    const logger = warnings();

    const result = await runForecast({ Switzerland: ["Zermatt"] }, { source, logger });

    expect(result.size).toBe(0);
    expect(logger.warned).toEqual(["No matching resort found for Zermatt in Switzerland"]);
    expect(calls).toEqual(["directory:Switzerland"]);
  });

  it("omits resorts whose forecast is missing or empty", async () => {
    const { source } = fakeSource(
      { Testland: [listing("Alpha"), listing("Beta"), listing("Gamma")] },
      {
        "/resorts/Alpha/6day/mid": null,
        "/resorts/Beta/6day/mid": [],
        "/resorts/Gamma/6day/mid": [period("AM")],
      }
    );

    const result = await runForecast({ Testland: ["Alpha", "Beta", "Gamma"] }, { source, logger: silentLogger });

    expect([...result.keys()]).toEqual(["Gamma"]);
  });

  it("fetches each directory once, in watch-list then resort order", async () => {
    const { source, calls } = fakeSource(
      {
        Switzerland: [listing("Engelberg"), listing("Laax")],
        Austria: [listing("Lech")],
      },
      {
        "/resorts/Engelberg/6day/mid": [period("AM")],
        "/resorts/Laax/6day/mid": [period("PM")],
        "/resorts/Lech/6day/mid": [period("night")],
      }
    );

    const result = await runForecast(
      { Switzerland: ["Laax", "Engelberg"], Austria: ["Lech"] },
      { source, logger: silentLogger }
    );

    expect(calls).toEqual([
      "directory:Switzerland",
      "forecast:/resorts/Laax/6day/mid",
      "forecast:/resorts/Engelberg/6day/mid",
      "directory:Austria",
      "forecast:/resorts/Lech/6day/mid",
    ]);
    expect([...result.keys()]).toEqual(["Laax", "Engelberg", "Lech"]);
  });

  it("does not fetch a directory for a country without resorts", async () => {
    const { source, calls } = fakeSource({}, {});
    await runForecast({ France: [] }, { source, logger: silentLogger });
    expect(calls).toEqual([]);
  });

  it("fetches a country's directory once for several unresolved entries", async () => {
    const { source, calls } = fakeSource(
      { Testland: [listing("Alpha"), listing("Beta")] },
      { "/resorts/Alpha/6day/mid": [period("AM")], "/resorts/Beta/6day/mid": [period("PM")] }
    );

    await runForecast({ Empty: [], Testland: ["Beta", "Zeta", "Alpha"] }, { source, logger: silentLogger });

    expect(calls).toEqual([
      "directory:Testland",
      "forecast:/resorts/Beta/6day/mid",
      "forecast:/resorts/Alpha/6day/mid",
    ]);
  });

  it("propagates transport errors", async () => {
    const source: ForecastSource = {
      fetchResortDirectory: vi.fn().mockRejectedValue(new Error("HTTP 502 for directory")),
      fetchResortForecast: vi.fn(),
    };
    await expect(runForecast({ Testland: ["Alpha"] }, { source, logger: silentLogger })).rejects.toThrow(
      "HTTP 502 for directory"
    );
  });
});

describe("collectResortForecasts", () => {
  it("carries the resolved resort and page location", async () => {
    const source: ForecastSource = {
      fetchResortDirectory: async () => [listing("Alpha")],
      fetchResortForecast: async () => ({ periods: [period("AM")], location: { lat: 1, lon: 2 } }),
    };

    const forecasts = await collectResortForecasts({ Testland: ["alp"] }, { source, logger: silentLogger });

    expect(forecasts).toEqual([
      {
        resort: { name: "Alpha", country: "Testland", url: "/resorts/Alpha", dataUrl: "/resorts/Alpha/6day/mid" },
        location: { lat: 1, lon: 2 },
        periods: [period("AM")],
      },
    ]);
  });

  it("toForecastSet keeps the last forecast for a repeated resort name", () => {
    const resort = { name: "Alpha", country: "Testland", url: "/a", dataUrl: "/a/6day" };
    const set = toForecastSet([
      { resort, location: null, periods: [period("AM")] },
      { resort, location: null, periods: [period("PM")] },
    ]);
    expect(set.get("Alpha")).toEqual([period("PM")]);
  });
});

describe("runForecast with caches", () => {
  function caches() {
    const db = new Database(":memory:");
    initSchema(db);
    return {
      directoryCache: new SqliteResortDirectoryCache(db),
      resolvedCache: new SqliteResolvedResortCache(db),
    };
  }

  it("reuses a cached directory instead of fetching", async () => {
    const { directoryCache } = caches();
    directoryCache.save("Testland", [listing("Alpha")]);
    const { source, calls } = fakeSource({}, { "/resorts/Alpha/6day/mid": [period("AM")] });

    const result = await runForecast({ Testland: ["Alpha"] }, { source, logger: silentLogger, directoryCache });

    expect(calls).toEqual(["forecast:/resorts/Alpha/6day/mid"]);
    expect([...result.keys()]).toEqual(["Alpha"]);
  });

  it("stores a fetched directory for the next run", async () => {
    const { directoryCache } = caches();
    const { source } = fakeSource({ Testland: [listing("Alpha"), listing("Beta")] }, {});

    await runForecast({ Testland: ["Beta"] }, { source, logger: silentLogger, directoryCache });

    expect(directoryCache.load("Testland")?.map((r) => r.name)).toEqual(["Alpha", "Beta"]);
  });

  it("skips the directory when every entry is already resolved", async () => {
    const { directoryCache, resolvedCache } = caches();
    resolvedCache.save(
      { country: "Testland", resortName: "alp" },
      { name: "Alpha", country: "Testland", url: "/resorts/Alpha", dataUrl: "/resorts/Alpha/6day/mid" }
    );
    const { source, calls } = fakeSource({}, { "/resorts/Alpha/6day/mid": [period("AM")] });

    const result = await runForecast(
      { Testland: ["Alp"] },
      { source, logger: silentLogger, directoryCache, resolvedCache }
    );

    expect(calls).toEqual(["forecast:/resorts/Alpha/6day/mid"]);
    expect([...result.keys()]).toEqual(["Alpha"]);
  });

  it("remembers new resolutions", async () => {
    const { resolvedCache } = caches();
    const { source } = fakeSource({ Testland: [listing("Alpha")] }, {});

    await runForecast({ Testland: ["alp"] }, { source, logger: silentLogger, resolvedCache });

    expect(resolvedCache.load({ country: "Testland", resortName: "ALP" })?.name).toBe("Alpha");
  });
});
