import { IndexRequestCancelledError, TransientIndexError } from '../errors';
import { LookupCache, buildCacheKey } from '../models/lookupCache';
import { pickBestCandidate } from '../scoring/candidateScore';
import { IndexCandidate, IndexQuery, MatchCandidate, MatchResult, MediaIndex, ResolveOutcome } from '../types/Match';
import { ParsedName } from '../types/ParsedName';
import { Sleep, backoffDelay, defaultSleep } from './backoff';
import { shortenTitle } from './queryRelaxation';

/**
 * States of one resolution. Each pass of the loop in `resolve` handles
 * exactly one state, so every exit is a terminal state below.
 */
export type ResolveState =
  | 'PENDING'
  | 'CACHE_HIT'
  | 'CACHE_MISS'
  | 'QUERYING'
  | 'TRANSIENT_ERROR'
  | 'SCORED_HIGH'
  | 'ENRICHING'
  | 'SCORED_LOW'
  | 'RELAX_QUERY'
  | 'TERMINAL_LOW'
  | 'FAILED';

export interface IdentityMatcherOptions {
  acceptanceThreshold: number;
  /** Relaxed queries keep at least this fraction of the title's words */
  floorFraction: number;
  /** Titles shorter than this are never relaxed */
  minRelaxWords: number;
  /** Upper bound on index queries per resolution (relaxation included) */
  maxAttempts: number;
  /** Tries per query when the index fails transiently, the first one included */
  networkAttempts: number;
  backoffBaseMs: number;
  highConfidenceTtlMs: number;
  lowConfidenceTtlMs: number;
  /** Re-issue a query without its year when the year-filtered search came back empty */
  retryWithoutYear: boolean;
  /** Complete high-confidence matches with the index's details lookup, when it has one */
  fetchDetails: boolean;
  sleep: Sleep;
}

export const DEFAULT_MATCHER_OPTIONS: IdentityMatcherOptions = {
  acceptanceThreshold: 0.6,
  floorFraction: 0.6,
  minRelaxWords: 2,
  maxAttempts: 5,
  networkAttempts: 3,
  backoffBaseMs: 500,
  highConfidenceTtlMs: 24 * 60 * 60 * 1000,
  lowConfidenceTtlMs: 60 * 60 * 1000,
  retryWithoutYear: true,
  fetchDetails: true,
  sleep: defaultSleep,
};

export interface ResolveOptions {
  signal?: AbortSignal;
}

/**
 * Resolves parsed release names against a media index, with a lookup cache in
 * front and progressive query relaxation when confidence is low.
 *
 * `resolve` never throws for misses or index failures: those come back as
 * `confidence: 'none'` or a `transient_error` outcome.
 */
export class IdentityMatcher {
  private readonly options: IdentityMatcherOptions;

  constructor(
    private readonly index: MediaIndex,
    private readonly cache: LookupCache,
    options: Partial<IdentityMatcherOptions> = {}
  ) {
    this.options = { ...DEFAULT_MATCHER_OPTIONS, ...options };
  }

  async resolve(parsed: ParsedName, resolveOptions: ResolveOptions = {}): Promise<ResolveOutcome> {
    const { signal } = resolveOptions;
    const key = buildCacheKey(parsed.rawTitle, parsed.contentType, parsed.year, parsed.season, parsed.episode);

    let state: ResolveState = 'PENDING';
    let cached: MatchResult | undefined;
    let query: IndexQuery = { title: parsed.rawTitle, year: parsed.year, contentType: parsed.contentType };
    let queryUsed = query.title;
    let best: MatchCandidate | undefined;
    let lastResults: IndexCandidate[] = [];
    let attempts = 0;
    let networkTries = 0;
    let lastTransient: TransientIndexError | undefined;
    let uncacheable = false;

    for (;;) {
      switch (state) {
        case 'PENDING':
          cached = this.readCache(key);
          state = cached ? 'CACHE_HIT' : 'CACHE_MISS';
          break;

        case 'CACHE_HIT':
          if (!cached) {
            state = 'CACHE_MISS';
            break;
          }
          return { status: 'resolved', result: cached, fromCache: true };

        case 'CACHE_MISS':
          state = 'QUERYING';
          break;

        case 'QUERYING': {
          if (signal?.aborted) {
            return { status: 'cancelled', attempts };
          }
          if (networkTries === 0) {
            if (attempts >= this.options.maxAttempts) {
              state = 'TERMINAL_LOW';
              break;
            }
            attempts++;
          }
          networkTries++;

          try {
            lastResults = await this.index.search(query, signal);
          } catch (error) {
            if (error instanceof IndexRequestCancelledError || signal?.aborted) {
              return { status: 'cancelled', attempts };
            }
            if (error instanceof TransientIndexError) {
              lastTransient = error;
              state = 'TRANSIENT_ERROR';
              break;
            }
            console.error(`Index search failed for "${query.title}":`, error instanceof Error ? error.message : error);
            uncacheable = true;
            lastResults = [];
          }
          networkTries = 0;

          const candidate = pickBestCandidate(parsed.rawTitle, parsed.year, lastResults);
          if (candidate && (!best || candidate.score > best.score)) {
            best = candidate;
            queryUsed = query.title;
          } else if (!best) {
            queryUsed = query.title;
          }
          state = best && best.score >= this.options.acceptanceThreshold ? 'SCORED_HIGH' : 'SCORED_LOW';
          break;
        }

        case 'TRANSIENT_ERROR':
          if (networkTries >= this.options.networkAttempts) {
            state = 'FAILED';
            break;
          }
          {
            const delay = backoffDelay(this.options.backoffBaseMs, networkTries);
            console.warn(
              `Index search for "${query.title}" failed (${lastTransient?.message}), retrying in ${delay}ms`
            );
            await this.options.sleep(delay);
          }
          state = 'QUERYING';
          break;

        case 'SCORED_HIGH':
          if (this.options.fetchDetails && this.index.details) {
            state = 'ENRICHING';
            break;
          }
          return this.accept(key, parsed, { candidate: best, confidence: 'high', queryUsed, attempts });

        case 'ENRICHING':
          if (best) {
            try {
              const details = await this.index.details?.(
                { id: best.externalId, mediaType: best.mediaType, season: parsed.season, episode: parsed.episode },
                signal
              );
              if (details) best = { ...best, ...details };
            } catch (error) {
              if (error instanceof IndexRequestCancelledError || signal?.aborted) {
                return { status: 'cancelled', attempts };
              }
              console.warn(
                `Details lookup failed for "${best.title}" (${best.externalId}):`,
                error instanceof Error ? error.message : error
              );
            }
          }
          return this.accept(key, parsed, { candidate: best, confidence: 'high', queryUsed, attempts });

        case 'SCORED_LOW':
          state = 'RELAX_QUERY';
          break;

        case 'RELAX_QUERY': {
          const next = this.nextQuery(parsed, query, lastResults.length === 0);
          if (next) {
            query = next;
            state = 'QUERYING';
          } else {
            state = 'TERMINAL_LOW';
          }
          break;
        }

        case 'TERMINAL_LOW': {
          const result: MatchResult = best
            ? { candidate: best, confidence: 'low', queryUsed, attempts }
            : { confidence: 'none', queryUsed, attempts };
          if (!uncacheable) {
            this.writeCache(key, result, this.options.lowConfidenceTtlMs);
          }
          if (!best) {
            console.warn(`No match for "${parsed.rawTitle}" after ${attempts} attempt(s)`);
          }
          return { status: 'resolved', result, fromCache: false };
        }

        case 'FAILED':
          return {
            status: 'transient_error',
            message: lastTransient?.message ?? 'Index unavailable',
            queryUsed: query.title,
            attempts,
          };
      }
    }
  }

  private accept(key: string, parsed: ParsedName, result: MatchResult): ResolveOutcome {
    this.writeCache(key, result, this.options.highConfidenceTtlMs);
    console.log(`Match found: "${parsed.rawTitle}" -> "${result.candidate?.title}" (${result.candidate?.score.toFixed(3)})`);
    return { status: 'resolved', result, fromCache: false };
  }

  /**
   * Next query after a low-confidence answer: first drop the year filter if
   * it emptied the search, then drop trailing title words down to the floor.
   */
  private nextQuery(parsed: ParsedName, query: IndexQuery, lastWasEmpty: boolean): IndexQuery | undefined {
    if (this.options.retryWithoutYear && lastWasEmpty && query.year !== undefined) {
      return { ...query, year: undefined };
    }
    const shorter = shortenTitle(parsed.rawTitle, query.title, this.options);
    return shorter ? { ...query, title: shorter } : undefined;
  }

  private readCache(key: string): MatchResult | undefined {
    try {
      return this.cache.get(key);
    } catch (error) {
      console.error(`Lookup cache read failed for "${key}":`, error);
      return undefined;
    }
  }

  private writeCache(key: string, result: MatchResult, ttlMs: number): void {
    try {
      this.cache.put(key, result, ttlMs);
    } catch (error) {
      console.error(`Lookup cache write failed for "${key}":`, error);
    }
  }
}
