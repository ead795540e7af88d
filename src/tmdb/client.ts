import axios, { AxiosInstance } from 'axios';
import { ConfigurationError, IndexRequestCancelledError, IndexRequestError, TransientIndexError } from '../errors';
import { DetailsRequest, IndexCandidate, IndexQuery, MediaDetails, MediaIndex } from '../types/Match';

export interface TMDBMovieResult {
  id: number;
  title: string;
  original_title?: string;
  release_date?: string;
  overview?: string;
  original_language?: string;
  popularity?: number;
}

export interface TMDBTvResult {
  id: number;
  name: string;
  original_name?: string;
  first_air_date?: string;
  overview?: string;
  original_language?: string;
  popularity?: number;
}

export interface TMDBGenre {
  id: number;
  name: string;
}

export interface TMDBMovie {
  id: number;
  title: string;
  genres?: TMDBGenre[];
  imdb_id?: string | null;
  runtime?: number | null;
}

export interface TMDBTvShow {
  id: number;
  name: string;
  genres?: TMDBGenre[];
  episode_run_time?: number[];
  external_ids?: {
    imdb_id?: string | null;
  };
}

interface TMDBSeason {
  name?: string;
  overview?: string;
}

interface TMDBEpisode {
  name?: string;
  overview?: string;
}

type TMDBMultiResult =
  | (TMDBMovieResult & { media_type: 'movie' })
  | (TMDBTvResult & { media_type: 'tv' })
  | { media_type: 'person'; id: number; name: string };

interface TMDBSearchResponse<T> {
  results?: T[];
  total_results?: number;
}

export interface TMDBClientOptions {
  apiKey: string;
  language?: string;
  timeoutMs?: number;
  /** Pre-built axios instance; tests inject one with a stubbed `get` */
  http?: AxiosInstance;
}

type SearchParams = Record<string, string | number>;

export function movieToCandidate(movie: TMDBMovieResult): IndexCandidate {
  return {
    id: movie.id,
    mediaType: 'movie',
    title: movie.title,
    originalTitle: movie.original_title,
    releaseDate: movie.release_date,
    overview: movie.overview,
  };
}

export function tvToCandidate(show: TMDBTvResult): IndexCandidate {
  return {
    id: show.id,
    mediaType: 'tv',
    title: show.name,
    originalTitle: show.original_name,
    releaseDate: show.first_air_date,
    overview: show.overview,
  };
}

function genreNames(genres: TMDBGenre[] | undefined): string[] {
  return (genres || []).map((genre) => genre.name);
}

/**
 * Map an axios failure onto the index error taxonomy: no response (timeout,
 * connection reset), 5xx and 429 are transient; other statuses are not.
 */
export function classifyRequestError(error: unknown): Error {
  if (axios.isCancel(error)) {
    return new IndexRequestCancelledError();
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new TransientIndexError(`TMDB request failed: ${error.code || error.message}`);
    }
    if (status >= 500 || status === 429) {
      return new TransientIndexError(`TMDB responded ${status}`, status);
    }
    return new IndexRequestError(`TMDB responded ${status}`, status);
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * TMDB v3 client. Movies go to /search/movie, series and anime to /search/tv,
 * and names of unknown type to /search/multi (people filtered out). Accepted
 * matches are completed from /movie/{id} or /tv/{id}.
 */
class TMDBClient implements MediaIndex {
  private client: AxiosInstance;
  private readonly apiKey: string;
  private readonly language: string;

  constructor(options: TMDBClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('TMDB_API_KEY is required to resolve titles');
    }
    this.apiKey = options.apiKey;
    this.language = options.language || 'en-US';
    this.client =
      options.http ??
      axios.create({
        baseURL: 'https://api.themoviedb.org/3',
        timeout: options.timeoutMs ?? 10000,
      });
  }

  async search(query: IndexQuery, signal?: AbortSignal): Promise<IndexCandidate[]> {
    switch (query.contentType) {
      case 'movie':
        return this.searchMovies(query.title, query.year, signal);
      case 'series':
      case 'anime':
        return this.searchTv(query.title, query.year, signal);
      default:
        return this.searchMulti(query.title, query.year, signal);
    }
  }

  async searchMovies(title: string, year?: number, signal?: AbortSignal): Promise<IndexCandidate[]> {
    const params: SearchParams = { query: title };
    if (year) {
      params.year = year;
    }
    const results = await this.get<TMDBMovieResult>('/search/movie', params, signal);
    return results.map(movieToCandidate);
  }

  async searchTv(title: string, year?: number, signal?: AbortSignal): Promise<IndexCandidate[]> {
    const params: SearchParams = { query: title };
    if (year) {
      params.first_air_date_year = year;
    }
    const results = await this.get<TMDBTvResult>('/search/tv', params, signal);
    return results.map(tvToCandidate);
  }

  async searchMulti(title: string, year?: number, signal?: AbortSignal): Promise<IndexCandidate[]> {
    const results = await this.get<TMDBMultiResult>('/search/multi', { query: title }, signal);
    const candidates: IndexCandidate[] = [];
    for (const result of results) {
      if (result.media_type === 'movie') candidates.push(movieToCandidate(result));
      else if (result.media_type === 'tv') candidates.push(tvToCandidate(result));
    }
    // /search/multi has no year filter; prefer same-year hits the way the typed searches would
    if (year) {
      const sameYear = candidates.filter((c) => c.releaseDate?.startsWith(String(year)));
      return [...sameYear, ...candidates.filter((c) => !sameYear.includes(c))];
    }
    return candidates;
  }

  async details(request: DetailsRequest, signal?: AbortSignal): Promise<MediaDetails> {
    if (request.mediaType === 'movie') {
      return this.getMovieDetails(request.id, signal);
    }
    return this.getTvDetails(request.id, request.season, request.episode, signal);
  }

  async getMovieDetails(tmdbId: number, signal?: AbortSignal): Promise<MediaDetails> {
    const movie = await this.request<TMDBMovie>(`/movie/${tmdbId}`, {}, signal);
    return {
      genres: genreNames(movie.genres),
      imdbId: movie.imdb_id || undefined,
      runtime: movie.runtime || undefined,
    };
  }

  /**
   * Show details, plus the episode (or, for a season pack, the season) named
   * by `season`/`episode`. A season or episode TMDB does not know is skipped.
   */
  async getTvDetails(tmdbId: number, season?: number, episode?: number, signal?: AbortSignal): Promise<MediaDetails> {
    const show = await this.request<TMDBTvShow>(`/tv/${tmdbId}`, { append_to_response: 'external_ids' }, signal);
    const details: MediaDetails = {
      genres: genreNames(show.genres),
      imdbId: show.external_ids?.imdb_id || undefined,
      runtime: show.episode_run_time?.[0],
    };
    if (season === undefined) {
      return details;
    }

    try {
      if (episode !== undefined) {
        const found = await this.request<TMDBEpisode>(`/tv/${tmdbId}/season/${season}/episode/${episode}`, {}, signal);
        return { ...details, episodeName: found.name || undefined, episodeOverview: found.overview || undefined };
      }
      const found = await this.request<TMDBSeason>(`/tv/${tmdbId}/season/${season}`, {}, signal);
      return { ...details, episodeName: found.name || `Season ${season}`, episodeOverview: found.overview || undefined };
    } catch (error) {
      if (error instanceof IndexRequestError) {
        const position = episode !== undefined ? `season ${season} episode ${episode}` : `season ${season}`;
        console.log(`TMDB show ${tmdbId} has no ${position} (${error.status})`);
        return details;
      }
      throw error;
    }
  }

  private async get<T>(endpoint: string, params: SearchParams, signal?: AbortSignal): Promise<T[]> {
    const data = await this.request<TMDBSearchResponse<T>>(endpoint, { include_adult: 'false', ...params }, signal);
    return data.results || [];
  }

  private async request<T>(endpoint: string, params: SearchParams, signal?: AbortSignal): Promise<T> {
    try {
      const response = await this.client.get<T>(endpoint, {
        params: {
          api_key: this.apiKey,
          language: this.language,
          ...params,
        },
        signal,
      });
      return response.data;
    } catch (error) {
      throw classifyRequestError(error);
    }
  }
}

export { TMDBClient };
