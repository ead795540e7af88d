import type { DatabaseHandle } from '../db';
import { MatchCandidate, MatchResult } from '../types/Match';
import { ContentType } from '../types/ParsedName';
import { normalizeTitle } from '../utils/titleSimilarity';

export interface LookupCacheStats {
  /** Live (unexpired) entries */
  entryCount: number;
  expiredCount: number;
  hitCount: number;
  missCount: number;
}

/**
 * Key → MatchResult store with per-entry expiry. `get` never returns an
 * expired entry; `put` replaces whatever was stored under the key.
 */
export interface LookupCache {
  get(key: string): MatchResult | undefined;
  put(key: string, value: MatchResult, ttlMs: number): void;
  clear(): void;
  stats(): LookupCacheStats;
}

export interface CacheClockOptions {
  now?: () => number;
}

/**
 * Cache key for a lookup. Names with a season also carry the season and
 * episode, since the cached match then holds episode details.
 */
export function buildCacheKey(
  title: string,
  contentType: ContentType,
  year?: number,
  season?: number,
  episode?: number
): string {
  const key = `${normalizeTitle(title)}|${contentType}|${year ?? ''}`;
  if (season === undefined) return key;
  return `${key}|s${season}${episode !== undefined ? `e${episode}` : ''}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptional(value: unknown, type: 'string' | 'number'): boolean {
  return value === undefined || typeof value === type;
}

function isMatchCandidate(value: unknown): value is MatchCandidate {
  return (
    isRecord(value) &&
    typeof value.externalId === 'number' &&
    (value.mediaType === 'movie' || value.mediaType === 'tv') &&
    typeof value.title === 'string' &&
    typeof value.originalTitle === 'string' &&
    typeof value.overview === 'string' &&
    typeof value.score === 'number' &&
    isOptional(value.releaseYear, 'number') &&
    (value.genres === undefined ||
      (Array.isArray(value.genres) && value.genres.every((genre) => typeof genre === 'string'))) &&
    isOptional(value.imdbId, 'string') &&
    isOptional(value.runtime, 'number') &&
    isOptional(value.episodeName, 'string') &&
    isOptional(value.episodeOverview, 'string')
  );
}

export function isMatchResult(value: unknown): value is MatchResult {
  if (!isRecord(value)) return false;
  if (typeof value.queryUsed !== 'string' || typeof value.attempts !== 'number') return false;
  if (value.confidence === 'none') return value.candidate === undefined;
  if (value.confidence === 'high' || value.confidence === 'low') return isMatchCandidate(value.candidate);
  return false;
}

/**
 * Parse a stored value; undefined when it is not a well-formed MatchResult.
 */
export function deserializeMatchResult(raw: string): MatchResult | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isMatchResult(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

interface CacheRow {
  key: string;
  value: string;
  created_at: number;
  ttl_ms: number;
}

/**
 * Lookup cache persisted in SQLite. Hit and miss counters live in their own
 * table so the stats command sees totals across runs.
 */
export class SqliteLookupCache implements LookupCache {
  private readonly now: () => number;

  constructor(private readonly db: DatabaseHandle, options: CacheClockOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): MatchResult | undefined {
    const row = this.db
      .prepare('SELECT key, value, created_at, ttl_ms FROM lookup_cache WHERE key = ?')
      .get(key) as CacheRow | undefined;

    if (!row) {
      this.bump('miss_count');
      return undefined;
    }

    if (this.now() - row.created_at >= row.ttl_ms) {
      this.db.prepare('DELETE FROM lookup_cache WHERE key = ?').run(key);
      this.bump('miss_count');
      return undefined;
    }

    const value = deserializeMatchResult(row.value);
    if (!value) {
      console.warn(`Lookup cache entry "${key}" is corrupt, evicting`);
      this.db.prepare('DELETE FROM lookup_cache WHERE key = ?').run(key);
      this.bump('miss_count');
      return undefined;
    }

    this.bump('hit_count');
    return value;
  }

  put(key: string, value: MatchResult, ttlMs: number): void {
    this.db
      .prepare('INSERT OR REPLACE INTO lookup_cache (key, value, created_at, ttl_ms) VALUES (?, ?, ?, ?)')
      .run(key, JSON.stringify(value), this.now(), ttlMs);
  }

  clear(): void {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM lookup_cache').run();
      this.db.prepare('DELETE FROM lookup_cache_counters').run();
    })();
  }

  stats(): LookupCacheStats {
    const now = this.now();
    const counts = this.db
      .prepare(
        `SELECT
           COALESCE(SUM(CASE WHEN ? - created_at < ttl_ms THEN 1 ELSE 0 END), 0) AS live,
           COUNT(*) AS total
         FROM lookup_cache`
      )
      .get(now) as { live: number; total: number };

    return {
      entryCount: counts.live,
      expiredCount: counts.total - counts.live,
      hitCount: this.counter('hit_count'),
      missCount: this.counter('miss_count'),
    };
  }

  private bump(name: string): void {
    this.db
      .prepare(
        `INSERT INTO lookup_cache_counters (name, value) VALUES (?, 1)
         ON CONFLICT(name) DO UPDATE SET value = value + 1`
      )
      .run(name);
  }

  private counter(name: string): number {
    const row = this.db.prepare('SELECT value FROM lookup_cache_counters WHERE name = ?').get(name) as
      | { value: number }
      | undefined;
    return row?.value ?? 0;
  }
}

interface MemoryEntry {
  value: string;
  createdAt: number;
  ttlMs: number;
}

/**
 * In-process cache with the same contract, for tests and one-off runs.
 * Values are stored serialized so callers never share mutable state.
 */
export class MemoryLookupCache implements LookupCache {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheClockOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): MatchResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() - entry.createdAt >= entry.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    const value = deserializeMatchResult(entry.value);
    if (!value) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return value;
  }

  put(key: string, value: MatchResult, ttlMs: number): void {
    this.entries.set(key, { value: JSON.stringify(value), createdAt: this.now(), ttlMs });
  }

  /** Store a raw serialized value, bypassing validation */
  putRaw(key: string, raw: string, ttlMs: number): void {
    this.entries.set(key, { value: raw, createdAt: this.now(), ttlMs });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): LookupCacheStats {
    const now = this.now();
    let live = 0;
    for (const entry of this.entries.values()) {
      if (now - entry.createdAt < entry.ttlMs) live++;
    }
    return {
      entryCount: live,
      expiredCount: this.entries.size - live,
      hitCount: this.hits,
      missCount: this.misses,
    };
  }
}
