/**
 * Title similarity utilities for matching parsed release titles to index results
 */

/**
 * Fold a title for comparison: strip diacritics, lowercase, turn punctuation
 * into spaces and collapse whitespace. "Amélie!" and "amelie" compare equal.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Calculate similarity score between two titles (0-1)
 * Uses a combination of exact match, contains match, and word overlap
 */
export function calculateTitleSimilarity(str1: string, str2: string): number {
  const s1 = normalizeTitle(str1);
  const s2 = normalizeTitle(str2);

  if (s1.length === 0 || s2.length === 0) return 0;

  // Exact match
  if (s1 === s2) return 1.0;

  // One contains the other as whole words (high similarity)
  const padded1 = ` ${s1} `;
  const padded2 = ` ${s2} `;
  if (padded1.includes(padded2) || padded2.includes(padded1)) {
    const longer = s1.length > s2.length ? s1 : s2;
    const shorter = s1.length > s2.length ? s2 : s1;
    return 0.7 + (shorter.length / longer.length) * 0.2; // 0.7-0.9 range
  }

  // Word-based similarity
  const words1 = s1.split(' ');
  const words2 = s2.split(' ');

  const unique1 = new Set(words1);
  const unique2 = new Set(words2);
  const common = [...unique1].filter(w => unique2.has(w));
  const totalUniqueWords = new Set([...unique1, ...unique2]).size;

  // Jaccard similarity (intersection over union)
  const jaccard = common.length / totalUniqueWords;

  // Also check if all words from shorter title are in longer title
  const shorterWords = unique1.size <= unique2.size ? unique1 : unique2;
  const longerWords = unique1.size <= unique2.size ? unique2 : unique1;
  const allWordsMatch = [...shorterWords].every(w => longerWords.has(w));

  if (allWordsMatch) {
    return Math.max(jaccard, 0.6); // Boost if all words match
  }

  return jaccard;
}

/**
 * Year proximity credit: 1 for the same year, 0.5 when one year apart,
 * 0 otherwise or when the candidate year is unknown.
 */
export function yearProximity(parsedYear: number, candidateYear: number | undefined): number {
  if (candidateYear === undefined) return 0;
  const diff = Math.abs(parsedYear - candidateYear);
  if (diff === 0) return 1;
  if (diff === 1) return 0.5;
  return 0;
}

/**
 * Extract the year from an index date string ("2023-05-17" → 2023)
 */
export function yearFromDate(date: string | null | undefined): number | undefined {
  if (!date) return undefined;
  const match = date.match(/^(\d{4})/);
  if (!match) return undefined;
  const year = parseInt(match[1], 10);
  return isNaN(year) ? undefined : year;
}
