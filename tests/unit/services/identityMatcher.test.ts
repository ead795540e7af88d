import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { IndexRequestCancelledError, IndexRequestError, TransientIndexError } from '../../../src/errors';
import { MemoryLookupCache, buildCacheKey } from '../../../src/models/lookupCache';
import { IdentityMatcher, IdentityMatcherOptions } from '../../../src/services/identityMatcher';
import { DetailsRequest, IndexCandidate, IndexQuery, MediaDetails, MediaIndex } from '../../../src/types/Match';
import { ParsedName } from '../../../src/types/ParsedName';

type Responder = (query: IndexQuery, signal?: AbortSignal) => IndexCandidate[] | Promise<IndexCandidate[]>;

class FakeIndex implements MediaIndex {
  readonly calls: IndexQuery[] = [];

  constructor(private readonly responder: Responder) {}

  async search(query: IndexQuery, signal?: AbortSignal): Promise<IndexCandidate[]> {
    this.calls.push({ ...query });
    return this.responder(query, signal);
  }
}

type Detailer = (request: DetailsRequest) => MediaDetails | Promise<MediaDetails>;

class DetailedIndex extends FakeIndex {
  readonly detailRequests: DetailsRequest[] = [];

  constructor(responder: Responder, private readonly detailer: Detailer) {
    super(responder);
  }

  async details(request: DetailsRequest): Promise<MediaDetails> {
    this.detailRequests.push({ ...request });
    return this.detailer(request);
  }
}

function parsedName(overrides: Partial<ParsedName>): ParsedName {
  return {
    rawTitle: '',
    contentType: 'movie',
    fullSeason: false,
    languages: [],
    subtitles: [],
    multiLanguage: false,
    ...overrides,
  };
}

function movie(id: number, title: string, releaseDate?: string): IndexCandidate {
  return { id, mediaType: 'movie', title, releaseDate };
}

const HOUR = 60 * 60 * 1000;

describe('IdentityMatcher', () => {
  let clock: number;
  let cache: MemoryLookupCache;
  let sleeps: number[];

  function matcherFor(index: MediaIndex, options: Partial<IdentityMatcherOptions> = {}) {
    return new IdentityMatcher(index, cache, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...options,
    });
  }

  beforeEach(() => {
    clock = 0;
    sleeps = [];
    cache = new MemoryLookupCache({ now: () => clock });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('direct matches', () => {
    it('should resolve an exact title and year with high confidence', async () => {
      const index = new FakeIndex(() => [movie(42, 'Movie Title', '2023-04-01')]);
      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(outcome.status).toBe('resolved');
      if (outcome.status !== 'resolved') return;
      expect(outcome.fromCache).toBe(false);
      expect(outcome.result.confidence).toBe('high');
      expect(outcome.result.candidate?.externalId).toBe(42);
      expect(outcome.result.candidate?.releaseYear).toBe(2023);
      expect(outcome.result.candidate?.score).toBeCloseTo(1, 5);
      expect(outcome.result.attempts).toBe(1);
      expect(outcome.result.queryUsed).toBe('Movie Title');
      expect(index.calls).toEqual([{ title: 'Movie Title', year: 2023, contentType: 'movie' }]);
    });

    it('should answer the second lookup from the cache without querying', async () => {
      const index = new FakeIndex(() => [movie(42, 'Movie Title', '2023-04-01')]);
      const matcher = matcherFor(index);
      const parsed = parsedName({ rawTitle: 'Movie Title', year: 2023 });

      await matcher.resolve(parsed);
      const second = await matcher.resolve(parsed);

      expect(index.calls).toHaveLength(1);
      expect(second).toMatchObject({ status: 'resolved', fromCache: true, result: { confidence: 'high' } });
    });

    it('should query again once a high-confidence entry expires', async () => {
      const index = new FakeIndex(() => [movie(42, 'Movie Title', '2023-04-01')]);
      const matcher = matcherFor(index);
      const parsed = parsedName({ rawTitle: 'Movie Title', year: 2023 });

      await matcher.resolve(parsed);
      clock = 24 * HOUR - 1;
      await matcher.resolve(parsed);
      expect(index.calls).toHaveLength(1);

      clock = 24 * HOUR;
      await matcher.resolve(parsed);
      expect(index.calls).toHaveLength(2);
    });

    it('should treat a corrupt cache entry as a miss', async () => {
      const index = new FakeIndex(() => [movie(42, 'Movie Title', '2023-04-01')]);
      cache.putRaw(buildCacheKey('Movie Title', 'movie', 2023), '{broken', HOUR);

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(outcome).toMatchObject({ status: 'resolved', fromCache: false });
      expect(index.calls).toHaveLength(1);
      expect(cache.stats().missCount).toBe(1);
    });
  });

  describe('relaxation', () => {
    it('should retry without the year when the year filter returns nothing', async () => {
      const index = new FakeIndex((query) => (query.year ? [] : [movie(7, 'Movie Title', '2022-05-01')]));
      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(index.calls).toEqual([
        { title: 'Movie Title', year: 2023, contentType: 'movie' },
        { title: 'Movie Title', year: undefined, contentType: 'movie' },
      ]);
      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'high', attempts: 2 } });
      if (outcome.status === 'resolved') {
        expect(outcome.result.candidate?.score).toBeCloseTo(0.9, 5);
      }
    });

    it('should drop trailing words until a confident match appears', async () => {
      const index = new FakeIndex((query) =>
        query.title === 'The Grand Budapest Hotel' ? [movie(9, 'The Grand Budapest Hotel', '2014-03-07')] : []
      );
      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'The Grand Budapest Hotel Extra' }));

      expect(index.calls.map((q) => q.title)).toEqual(['The Grand Budapest Hotel Extra', 'The Grand Budapest Hotel']);
      expect(outcome.status).toBe('resolved');
      if (outcome.status !== 'resolved') return;
      expect(outcome.result.confidence).toBe('high');
      expect(outcome.result.queryUsed).toBe('The Grand Budapest Hotel');
      expect(outcome.result.attempts).toBe(2);
      // scored against the full title: 24 of 30 characters contained
      expect(outcome.result.candidate?.score).toBeCloseTo(0.86, 5);
    });

    it('should never shorten below the floor and cache the miss briefly', async () => {
      const index = new FakeIndex(() => []);
      const parsed = parsedName({ rawTitle: 'alpha beta gamma delta epsilon' });
      const outcome = await matcherFor(index).resolve(parsed);

      expect(index.calls.map((q) => q.title)).toEqual([
        'alpha beta gamma delta epsilon',
        'alpha beta gamma delta',
        'alpha beta gamma',
      ]);
      expect(outcome).toEqual({
        status: 'resolved',
        fromCache: false,
        result: { confidence: 'none', queryUsed: 'alpha beta gamma', attempts: 3 },
      });

      const key = buildCacheKey(parsed.rawTitle, parsed.contentType, parsed.year);
      clock = HOUR - 1;
      expect(cache.get(key)?.confidence).toBe('none');
      clock = HOUR;
      expect(cache.get(key)).toBeUndefined();
    });

    it('should stop after maxAttempts queries', async () => {
      const index = new FakeIndex(() => []);
      await matcherFor(index, { maxAttempts: 2, floorFraction: 0.1 }).resolve(parsedName({ rawTitle: 'a b c d e' }));
      expect(index.calls).toHaveLength(2);
    });

    it('should not relax a one word title', async () => {
      const index = new FakeIndex(() => []);
      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Heat' }));
      expect(index.calls).toHaveLength(1);
      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'none', attempts: 1 } });
    });

    it('should return the best low-confidence candidate across attempts', async () => {
      const index = new FakeIndex((query) => {
        if (query.title === 'alpha beta gamma delta epsilon') return [movie(1, 'alpha zeta')];
        if (query.title === 'alpha beta gamma delta') return [movie(2, 'alpha beta gamma zeta omega')];
        return [];
      });
      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'alpha beta gamma delta epsilon' }));

      expect(outcome.status).toBe('resolved');
      if (outcome.status !== 'resolved') return;
      expect(outcome.result.confidence).toBe('low');
      expect(outcome.result.candidate?.externalId).toBe(2);
      expect(outcome.result.candidate?.score).toBeCloseTo(3 / 7, 5);
      expect(outcome.result.queryUsed).toBe('alpha beta gamma delta');
      expect(outcome.result.attempts).toBe(3);
    });
  });

  describe('index failures', () => {
    it('should retry transient failures with exponential backoff', async () => {
      let failures = 0;
      const index = new FakeIndex(() => {
        if (failures < 2) {
          failures++;
          throw new TransientIndexError('TMDB responded 503', 503);
        }
        return [movie(42, 'Movie Title', '2023-04-01')];
      });

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(sleeps).toEqual([500, 1000]);
      expect(index.calls).toHaveLength(3);
      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'high', attempts: 1 } });
    });

    it('should report a transient error once retries run out and cache nothing', async () => {
      const index = new FakeIndex(() => {
        throw new TransientIndexError('TMDB responded 503', 503);
      });

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(outcome).toEqual({
        status: 'transient_error',
        message: 'TMDB responded 503',
        queryUsed: 'Movie Title',
        attempts: 1,
      });
      expect(index.calls).toHaveLength(3);
      expect(sleeps).toEqual([500, 1000]);
      expect(cache.stats().entryCount).toBe(0);
    });

    it('should not cache a miss caused by a rejected request', async () => {
      const index = new FakeIndex(() => {
        throw new IndexRequestError('TMDB responded 401', 401);
      });

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Heat' }));

      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'none', attempts: 1 } });
      expect(sleeps).toEqual([]);
      expect(cache.stats().entryCount).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('should not query when the signal is already aborted', async () => {
      const index = new FakeIndex(() => []);
      const controller = new AbortController();
      controller.abort();

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title' }), {
        signal: controller.signal,
      });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 0 });
      expect(index.calls).toHaveLength(0);
    });

    it('should stop when the request is aborted mid-flight', async () => {
      const controller = new AbortController();
      const index = new FakeIndex(() => {
        controller.abort();
        throw new IndexRequestCancelledError();
      });

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }), {
        signal: controller.signal,
      });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
      expect(cache.stats().entryCount).toBe(0);
    });

    it('should stop relaxing once the signal aborts between attempts', async () => {
      const controller = new AbortController();
      const index = new FakeIndex(() => {
        controller.abort();
        return [];
      });

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'alpha beta gamma delta epsilon' }), {
        signal: controller.signal,
      });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
      expect(index.calls).toHaveLength(1);
      expect(cache.stats().entryCount).toBe(0);
    });
  });

  describe('details', () => {
    it('should complete a high-confidence match and cache the details with it', async () => {
      const index = new DetailedIndex(
        () => [movie(42, 'Movie Title', '2023-04-01')],
        () => ({ genres: ['Drama'], imdbId: 'tt0000042', runtime: 110 })
      );
      const matcher = matcherFor(index);
      const parsed = parsedName({ rawTitle: 'Movie Title', year: 2023 });

      const first = await matcher.resolve(parsed);
      const second = await matcher.resolve(parsed);

      expect(index.detailRequests).toEqual([{ id: 42, mediaType: 'movie', season: undefined, episode: undefined }]);
      expect(first).toMatchObject({
        status: 'resolved',
        fromCache: false,
        result: { confidence: 'high', candidate: { externalId: 42, genres: ['Drama'], imdbId: 'tt0000042', runtime: 110 } },
      });
      expect(second).toMatchObject({
        status: 'resolved',
        fromCache: true,
        result: { candidate: { genres: ['Drama'], imdbId: 'tt0000042' } },
      });
    });

    it('should ask for the episode and keep it under its own cache key', async () => {
      const index = new DetailedIndex(
        () => [{ id: 7, mediaType: 'tv', title: 'Show Name' }],
        () => ({ genres: ['Comedy'], episodeName: 'Pilot', episodeOverview: 'It begins.' })
      );
      const parsed = parsedName({ rawTitle: 'Show Name', contentType: 'series', season: 1, episode: 2 });

      const outcome = await matcherFor(index).resolve(parsed);

      expect(index.detailRequests).toEqual([{ id: 7, mediaType: 'tv', season: 1, episode: 2 }]);
      expect(outcome).toMatchObject({
        status: 'resolved',
        result: { candidate: { externalId: 7, episodeName: 'Pilot', episodeOverview: 'It begins.' } },
      });
      expect(cache.get('show name|series||s1e2')?.candidate?.episodeName).toBe('Pilot');
      expect(cache.get('show name|series|')).toBeUndefined();
    });

    it('should keep the match when the details lookup fails', async () => {
      const index = new DetailedIndex(
        () => [movie(42, 'Movie Title', '2023-04-01')],
        () => {
          throw new TransientIndexError('TMDB responded 503', 503);
        }
      );

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }));

      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'high', candidate: { externalId: 42 } } });
      if (outcome.status === 'resolved') {
        expect(outcome.result.candidate?.genres).toBeUndefined();
      }
      expect(console.warn).toHaveBeenCalledWith('Details lookup failed for "Movie Title" (42):', 'TMDB responded 503');
    });

    it('should not look up details for a low-confidence answer', async () => {
      const index = new DetailedIndex(
        () => [movie(1, 'alpha zeta')],
        () => ({ genres: [] })
      );

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'alpha beta gamma delta epsilon' }));

      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'low' } });
      expect(index.detailRequests).toEqual([]);
    });

    it('should skip details when turned off', async () => {
      const index = new DetailedIndex(
        () => [movie(42, 'Movie Title', '2023-04-01')],
        () => ({ genres: ['Drama'] })
      );

      const outcome = await matcherFor(index, { fetchDetails: false }).resolve(
        parsedName({ rawTitle: 'Movie Title', year: 2023 })
      );

      expect(outcome).toMatchObject({ status: 'resolved', result: { confidence: 'high' } });
      expect(index.detailRequests).toEqual([]);
    });

    it('should cancel without caching when the details request is aborted', async () => {
      const controller = new AbortController();
      const index = new DetailedIndex(
        () => [movie(42, 'Movie Title', '2023-04-01')],
        () => {
          controller.abort();
          throw new IndexRequestCancelledError();
        }
      );

      const outcome = await matcherFor(index).resolve(parsedName({ rawTitle: 'Movie Title', year: 2023 }), {
        signal: controller.signal,
      });

      expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
      expect(cache.stats().entryCount).toBe(0);
    });
  });
});
