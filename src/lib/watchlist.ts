import { existsSync, readFileSync } from "fs";
import { parse } from "yaml";
import { z } from "zod";
import type { WatchEntry, Watchlist } from "./types";

export class WatchlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WatchlistError";
  }
}

// A country may list no resorts (`Austria:` or `Austria: []`)
const WatchlistSchema = z.record(
  z.string(),
  z
    .array(z.union([z.string(), z.number()]).transform((name) => String(name).trim()))
    .nullish()
    .transform((names) => (names ?? []).filter((name) => name.length > 0))
);

export function parseWatchlist(source: string): Watchlist {
  let raw: unknown;
  try {
    raw = parse(source);
  } catch (err) {
    throw new WatchlistError(
      `Watch-list is not valid YAML: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (raw === null || raw === undefined) return {};

  const result = WatchlistSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new WatchlistError(`Invalid watch-list${where}: ${issue?.message ?? "unexpected shape"}`);
  }
  return result.data;
}

export function loadWatchlist(path: string): Watchlist {
  if (!existsSync(path)) {
    throw new WatchlistError(`Watch-list file '${path}' not found`);
  }
  return parseWatchlist(readFileSync(path, "utf-8"));
}

export function toWatchEntries(watchlist: Watchlist): WatchEntry[] {
  return Object.entries(watchlist).flatMap(([country, names]) =>
    names.map((resortName) => ({ country, resortName }))
  );
}
