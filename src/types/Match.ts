import { ContentType } from './ParsedName';

export type Confidence = 'high' | 'low' | 'none';
export type IndexMediaType = 'movie' | 'tv';

/**
 * One search hit as returned by a media index, before scoring.
 */
export interface IndexCandidate {
  id: number;
  mediaType: IndexMediaType;
  title: string;
  originalTitle?: string;
  releaseDate?: string;
  overview?: string;
}

export interface IndexQuery {
  title: string;
  year?: number;
  contentType: ContentType;
}

export interface DetailsRequest {
  id: number;
  mediaType: IndexMediaType;
  season?: number;
  episode?: number;
}

/** Extra facts about an accepted match, fetched after scoring */
export interface MediaDetails {
  genres: string[];
  imdbId?: string;
  /** Minutes; for series the usual episode length */
  runtime?: number;
  /** Episode name, or the season name for a season pack */
  episodeName?: string;
  episodeOverview?: string;
}

/**
 * Search-by-title media index. Implementations throw TransientIndexError for
 * retryable failures and IndexRequestError for rejected requests.
 */
export interface MediaIndex {
  search(query: IndexQuery, signal?: AbortSignal): Promise<IndexCandidate[]>;
  details?(request: DetailsRequest, signal?: AbortSignal): Promise<MediaDetails>;
}

export interface MatchCandidate {
  externalId: number;
  mediaType: IndexMediaType;
  title: string;
  originalTitle: string;
  releaseYear?: number;
  overview: string;
  score: number;
  genres?: string[];
  imdbId?: string;
  runtime?: number;
  episodeName?: string;
  episodeOverview?: string;
}

export interface MatchResult {
  candidate?: MatchCandidate;
  confidence: Confidence;
  queryUsed: string;
  attempts: number;
}

export type ResolveOutcome =
  | { status: 'resolved'; result: MatchResult; fromCache: boolean }
  | { status: 'transient_error'; message: string; queryUsed: string; attempts: number }
  | { status: 'cancelled'; attempts: number };
