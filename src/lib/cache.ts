import type Database from "better-sqlite3";
import type { ResolvedResort, ResortListing, WatchEntry } from "./types";

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours

export interface ResortDirectoryCache {
  /** Cached listings for a country, or null when absent or stale. */
  load(country: string): ResortListing[] | null;
  save(country: string, listings: readonly ResortListing[]): void;
}

export interface ResolvedResortCache {
  load(entry: WatchEntry): ResolvedResort | null;
  save(entry: WatchEntry, resort: ResolvedResort): void;
}

interface DirectoryRow {
  name: string;
  url: string;
  data_url: string;
  fetched_at: number;
}

interface ResolvedRow {
  name: string;
  url: string;
  data_url: string;
}

export class SqliteResortDirectoryCache implements ResortDirectoryCache {
  constructor(
    private readonly db: Database.Database,
    private readonly options: { ttlMs?: number; now?: () => number } = {}
  ) {}

  load(country: string): ResortListing[] | null {
    const rows = this.db
      .prepare<[string], DirectoryRow>(
        "SELECT name, url, data_url, fetched_at FROM resort_directory WHERE country = ? ORDER BY position"
      )
      .all(country);
    if (rows.length === 0) return null;

    const { ttlMs = DEFAULT_TTL_MS, now = Date.now } = this.options;
    if (now() - rows[0].fetched_at > ttlMs) return null;

    return rows.map((row) => ({ name: row.name, url: row.url, dataUrl: row.data_url }));
  }

  save(country: string, listings: readonly ResortListing[]): void {
    const { now = Date.now } = this.options;
    const fetchedAt = now();
    const remove = this.db.prepare("DELETE FROM resort_directory WHERE country = ?");
    const insert = this.db.prepare(
      `INSERT INTO resort_directory (country, position, name, url, data_url, fetched_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );

    this.db.transaction(() => {
      remove.run(country);
      listings.forEach((listing, position) => {
        insert.run(country, position, listing.name, listing.url, listing.dataUrl, fetchedAt);
      });
    })();
  }
}

export class SqliteResolvedResortCache implements ResolvedResortCache {
  constructor(private readonly db: Database.Database) {}

  load(entry: WatchEntry): ResolvedResort | null {
    const row = this.db
      .prepare<[string, string], ResolvedRow>(
        "SELECT name, url, data_url FROM resolved_resorts WHERE country = ? AND typed_name = ?"
      )
      .get(entry.country, entry.resortName.toLowerCase());
    if (!row) return null;
    return { name: row.name, country: entry.country, url: row.url, dataUrl: row.data_url };
  }

  save(entry: WatchEntry, resort: ResolvedResort): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO resolved_resorts (country, typed_name, name, url, data_url, resolved_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.country,
        entry.resortName.toLowerCase(),
        resort.name,
        resort.url,
        resort.dataUrl,
        new Date().toISOString()
      );
  }
}
