import { createHash } from "crypto";
import { getCacheDb } from "../db";

const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000; // 7 days

interface CacheRow {
  body: string;
  fetched_at: number;
  ttl_ms: number;
}

function isCacheRow(value: unknown): value is CacheRow {
  return (
    typeof value === "object" &&
    value !== null &&
    "body" in value &&
    typeof value.body === "string" &&
    "fetched_at" in value &&
    typeof value.fetched_at === "number" &&
    "ttl_ms" in value &&
    typeof value.ttl_ms === "number"
  );
}

function urlHash(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

/**
 * Cached body for `url` if an unexpired entry exists, otherwise null.
 * `ttlMs` tightens the per-entry TTL; 0 never matches.
 */
export function getHttpCache(url: string, ttlMs?: number): string | null {
  const ttl = ttlMs ?? DEFAULT_TTL_MS;
  if (ttl === 0) return null;

  const row: unknown = getCacheDb()
    .prepare("SELECT body, fetched_at, ttl_ms FROM http_cache WHERE url_hash = ?")
    .get(urlHash(url));
  if (!isCacheRow(row)) return null;

  const age = Date.now() - row.fetched_at;
  if (age > Math.min(ttl, row.ttl_ms)) return null;

  console.log(`[cache] hit ${url}`);
  return row.body;
}

export function setHttpCache(url: string, body: string, options?: { ttlMs?: number }): void {
  const ttlMs = options?.ttlMs ?? DEFAULT_TTL_MS;
  getCacheDb()
    .prepare(
      `INSERT OR REPLACE INTO http_cache (url_hash, url, body, fetched_at, ttl_ms)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(urlHash(url), url, body, Date.now(), ttlMs);
}

/** Delete expired entries; returns how many were removed. */
export function pruneHttpCache(): number {
  const result = getCacheDb()
    .prepare("DELETE FROM http_cache WHERE fetched_at + ttl_ms < ?")
    .run(Date.now());
  if (result.changes > 0) {
    console.log(`[cache] pruned ${result.changes} expired entries`);
  }
  return result.changes;
}

export function clearHttpCache(): void {
  getCacheDb().prepare("DELETE FROM http_cache").run();
}
