import type { AppConfig } from '../config';
import type { DatabaseHandle } from '../db';
import { LookupCache, SqliteLookupCache } from '../models/lookupCache';
import { analyzeReleaseName } from '../parsing/parseReleaseName';
import { TMDBClient } from '../tmdb/client';
import { ResolveOutcome } from '../types/Match';
import { ParsedName } from '../types/ParsedName';
import { IdentityMatcher, IdentityMatcherOptions, ResolveOptions } from './identityMatcher';

export interface Identification {
  name: string;
  parsed: ParsedName;
  outcome: ResolveOutcome;
}

/**
 * Analyzer + matcher + cache behind one object; what the routes and scripts
 * talk to.
 */
export class IdentificationService {
  constructor(
    private readonly matcher: IdentityMatcher,
    readonly cache: LookupCache
  ) {}

  analyze(name: string): ParsedName {
    return analyzeReleaseName(name);
  }

  async identify(name: string, options: ResolveOptions = {}): Promise<Identification> {
    const parsed = analyzeReleaseName(name);
    const outcome = await this.matcher.resolve(parsed, options);
    return { name, parsed, outcome };
  }

  /**
   * Identify a batch with at most `concurrency` resolutions in flight.
   * Results keep the input order; names not started before an abort come
   * back as cancelled.
   */
  async identifyMany(names: string[], options: BatchOptions = {}): Promise<Identification[]> {
    const concurrency = Math.max(1, options.concurrency ?? 3);
    const { signal } = options;
    const results: Identification[] = new Array(names.length);
    let next = 0;

    const worker = async () => {
      while (next < names.length) {
        const position = next++;
        const name = names[position];
        if (signal?.aborted) {
          results[position] = { name, parsed: analyzeReleaseName(name), outcome: { status: 'cancelled', attempts: 0 } };
          continue;
        }
        results[position] = await this.identify(name, { signal });
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(concurrency, names.length); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);
    return results;
  }
}

export interface BatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export function matcherOptionsFromConfig(appConfig: AppConfig): Partial<IdentityMatcherOptions> {
  return {
    acceptanceThreshold: appConfig.matching.acceptanceThreshold,
    floorFraction: appConfig.matching.floorFraction,
    maxAttempts: appConfig.matching.maxAttempts,
    fetchDetails: appConfig.tmdb.fetchDetails,
    highConfidenceTtlMs: appConfig.cache.ttlSeconds * 1000,
    lowConfidenceTtlMs: appConfig.cache.lowConfidenceTtlSeconds * 1000,
  };
}

/**
 * Wire the TMDB client and the SQLite cache from configuration.
 * Throws ConfigurationError when no TMDB API key is configured.
 */
export function createIdentificationService(appConfig: AppConfig, db: DatabaseHandle): IdentificationService {
  const index = new TMDBClient({
    apiKey: appConfig.tmdb.apiKey,
    language: appConfig.tmdb.language,
    timeoutMs: appConfig.tmdb.timeoutMs,
  });
  const cache = new SqliteLookupCache(db);
  return new IdentificationService(new IdentityMatcher(index, cache, matcherOptionsFromConfig(appConfig)), cache);
}
