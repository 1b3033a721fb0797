import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;

  const dbPath = path.resolve(process.cwd(), config.dbPath);
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS resort_directory (
      country TEXT NOT NULL,
      position INTEGER NOT NULL,
      name TEXT NOT NULL,
      url TEXT NOT NULL,
      data_url TEXT NOT NULL,
      fetched_at INTEGER NOT NULL,
      PRIMARY KEY (country, position)
    );

    CREATE TABLE IF NOT EXISTS resolved_resorts (
      country TEXT NOT NULL,
      typed_name TEXT NOT NULL,
      name TEXT NOT NULL,
      url TEXT NOT NULL,
      data_url TEXT NOT NULL,
      resolved_at TEXT NOT NULL,
      PRIMARY KEY (country, typed_name)
    );

    CREATE TABLE IF NOT EXISTS forecast_documents (
      name TEXT NOT NULL,
      country TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      lat REAL,
      lon REAL,
      total_snow REAL NOT NULL,
      forecast_json TEXT NOT NULL,
      PRIMARY KEY (name, country, timestamp)
    );

    CREATE INDEX IF NOT EXISTS idx_forecast_documents_timestamp
      ON forecast_documents(timestamp);
  `);
}
