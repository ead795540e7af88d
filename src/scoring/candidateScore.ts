import { IndexCandidate, MatchCandidate } from '../types/Match';
import { calculateTitleSimilarity, yearFromDate, yearProximity } from '../utils/titleSimilarity';

const TITLE_WEIGHT = 0.8;
const YEAR_WEIGHT = 0.2;

/**
 * Score an index candidate against the parsed title (0-1).
 *
 * Title similarity is the better of the localized and original titles. When
 * the release carries a year, 20% of the score comes from year proximity;
 * otherwise the title alone decides.
 */
export function scoreCandidate(parsedTitle: string, parsedYear: number | undefined, candidate: IndexCandidate): number {
  let titleScore = calculateTitleSimilarity(parsedTitle, candidate.title);
  if (candidate.originalTitle && candidate.originalTitle !== candidate.title) {
    titleScore = Math.max(titleScore, calculateTitleSimilarity(parsedTitle, candidate.originalTitle));
  }

  if (parsedYear === undefined) {
    return Math.min(titleScore, 1.0);
  }

  const yearScore = yearProximity(parsedYear, yearFromDate(candidate.releaseDate));
  return Math.min(titleScore * TITLE_WEIGHT + yearScore * YEAR_WEIGHT, 1.0);
}

export function toMatchCandidate(candidate: IndexCandidate, score: number): MatchCandidate {
  return {
    externalId: candidate.id,
    mediaType: candidate.mediaType,
    title: candidate.title,
    originalTitle: candidate.originalTitle || candidate.title,
    releaseYear: yearFromDate(candidate.releaseDate),
    overview: candidate.overview || '',
    score,
  };
}

/**
 * Best scoring candidate of one search answer; ties keep the index's order.
 */
export function pickBestCandidate(
  parsedTitle: string,
  parsedYear: number | undefined,
  candidates: IndexCandidate[]
): MatchCandidate | undefined {
  let best: MatchCandidate | undefined;
  for (const candidate of candidates) {
    const score = scoreCandidate(parsedTitle, parsedYear, candidate);
    if (!best || score > best.score) {
      best = toMatchCandidate(candidate, score);
    }
  }
  return best;
}
