/**
 * Title relaxation: when a search does not produce a confident match, the
 * query is retried with trailing words dropped, never going below a floor
 * fraction of the original word count.
 */

export interface RelaxationSettings {
  /** Fraction of the original word count a shortened query must keep */
  floorFraction: number;
  /** Titles with fewer words are never shortened */
  minRelaxWords: number;
}

export function titleWords(title: string): string[] {
  return title.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Smallest word count a relaxed query may have for a title of `wordCount` words.
 */
export function relaxationFloor(wordCount: number, floorFraction: number): number {
  const fraction = Math.min(Math.max(floorFraction, 0), 1);
  return Math.max(1, Math.ceil(wordCount * fraction));
}

/**
 * Next shorter query title, or undefined when shortening would go below the
 * floor (or the title is too short to relax at all).
 */
export function shortenTitle(originalTitle: string, currentTitle: string, settings: RelaxationSettings): string | undefined {
  const original = titleWords(originalTitle);
  const current = titleWords(currentTitle);
  if (original.length < settings.minRelaxWords) return undefined;

  const nextCount = current.length - 1;
  if (nextCount < relaxationFloor(original.length, settings.floorFraction)) return undefined;

  return current.slice(0, nextCount).join(' ');
}
