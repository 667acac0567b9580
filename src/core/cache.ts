import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { mkdirSync, unlinkSync } from 'node:fs';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';

/**
 * SQLite cache for SEC EDGAR API responses.
 * Caches at the HTTP response level to avoid redundant API calls.
 *
 * Resilient to corruption: if the DB can't be opened, it's deleted
 * and recreated. Cache is non-critical; losing it just means
 * re-fetching from SEC.
 */

const log = createLogger('cache');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

const MEM_CACHE_MAX = 100;

export interface CacheStats {
  entries: number;
  sizeBytes: number;
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

export class ResponseCache {
  private db: Database.Database | null = null;

  /** In-memory FIFO layer for hot-path hits within a session */
  private readonly mem = new Map<string, { body: string; expiresAt: number }>();

  constructor(
    private readonly dir: string,
    private readonly now: () => number = Date.now
  ) {}

  get path(): string {
    return join(this.dir, 'cache.db');
  }

  private open(): Database.Database {
    if (this.db) return this.db;

    mkdirSync(this.dir, { recursive: true });

    try {
      this.db = this.connect();
    } catch (err) {
      log.warn(`Cache database unreadable, recreating: ${err instanceof Error ? err.message : String(err)}`);
      for (const suffix of ['', '-wal', '-shm']) {
        try {
          unlinkSync(this.path + suffix);
        } catch (unlinkErr) {
          log.debug(`Could not remove ${this.path + suffix}: ${unlinkErr instanceof Error ? unlinkErr.message : String(unlinkErr)}`);
        }
      }
      this.db = this.connect();
    }

    return this.db;
  }

  private connect(): Database.Database {
    const db = new Database(this.path);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 3000');
    db.exec(SCHEMA);
    return db;
  }

  /** Get cached response if still valid */
  get(url: string): string | null {
    const hash = hashUrl(url);
    const now = this.now();

    const hot = this.mem.get(hash);
    if (hot && hot.expiresAt > now) return hot.body;

    const row = this.open().prepare(
      'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
    ).get(hash, new Date(now).toISOString()) as { response_body: string; expires_at: string } | undefined;

    if (!row) return null;

    this.remember(hash, row.response_body, new Date(row.expires_at).getTime());
    return row.response_body;
  }

  /** Store response in cache */
  set(url: string, body: string, ttlHours: number = 24): void {
    const hash = hashUrl(url);
    const fetchedAt = this.now();
    const expiresAt = fetchedAt + ttlHours * 60 * 60 * 1000;

    this.remember(hash, body, expiresAt);

    this.open().prepare(`
      INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(hash, url, body, new Date(fetchedAt).toISOString(), new Date(expiresAt).toISOString());
  }

  private remember(hash: string, body: string, expiresAt: number): void {
    if (this.mem.size >= MEM_CACHE_MAX && !this.mem.has(hash)) {
      const oldest = this.mem.keys().next();
      if (!oldest.done) this.mem.delete(oldest.value);
    }
    this.mem.set(hash, { body, expiresAt });
  }

  clear(): void {
    this.mem.clear();
    this.open().exec('DELETE FROM http_cache');
  }

  stats(): CacheStats {
    const row = this.open().prepare(
      'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
    ).get() as { count: number; size: number };
    return { entries: row.count, sizeBytes: row.size };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

let shared: ResponseCache | null = null;

/** Process-wide cache under the configured cache directory */
export function getCache(): ResponseCache {
  if (!shared) shared = new ResponseCache(getConfig().cacheDir);
  return shared;
}

export function closeCache(): void {
  if (shared) {
    shared.close();
    shared = null;
  }
}
