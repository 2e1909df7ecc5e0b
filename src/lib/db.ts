import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";

let cacheDb: Database.Database | null = null;

export function getCacheDb(): Database.Database {
  if (cacheDb) return cacheDb;

  if (config.cacheDbPath === ":memory:") {
    cacheDb = new Database(":memory:");
  } else {
    const dbPath = path.resolve(process.cwd(), config.cacheDbPath);
    const dir = path.dirname(dbPath);

    // Ensure directory exists
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    cacheDb = new Database(dbPath);
    cacheDb.pragma("journal_mode = WAL");
  }

  initCacheSchema(cacheDb);
  return cacheDb;
}

export function closeCacheDb(): void {
  if (!cacheDb) return;
  cacheDb.close();
  cacheDb = null;
}

function initCacheSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS http_cache (
      url_hash     TEXT PRIMARY KEY,
      url          TEXT NOT NULL,
      body         TEXT NOT NULL,
      fetched_at   INTEGER NOT NULL,
      ttl_ms       INTEGER NOT NULL
    );
  `);
}
