/**
 * Language mapping utilities for converting between ISO 639-1 codes, full
 * names and the language markers found in release names.
 */
import languages from '../data/languages.json';

interface LanguageData {
  names: Record<string, string>;
  releaseTokens: Record<string, string[]>;
  subtitleTokens: Record<string, string[]>;
}

const languageData: LanguageData = languages;

// ISO 639-1 (2-letter) to full language name mapping
export const LANGUAGE_NAMES: Record<string, string> = languageData.names;

// Full language name to ISO code mapping
export const LANGUAGE_NAME_TO_CODE: Record<string, string> = Object.fromEntries(
  Object.entries(LANGUAGE_NAMES).map(([code, name]) => [name, code])
);

function invertTokens(table: Record<string, string[]>): Map<string, string> {
  const byToken = new Map<string, string>();
  for (const [code, tokens] of Object.entries(table)) {
    for (const token of tokens) {
      byToken.set(token.toLowerCase(), code);
    }
  }
  return byToken;
}

const AUDIO_TOKEN_TO_CODE = invertTokens(languageData.releaseTokens);
const SUBTITLE_TOKEN_TO_CODE = invertTokens(languageData.subtitleTokens);

/** Every audio-language marker, longest first so alternations prefer "truefrench" over "french". */
export const AUDIO_LANGUAGE_TOKENS: string[] = [...AUDIO_TOKEN_TO_CODE.keys()].sort((a, b) => b.length - a.length);

export const SUBTITLE_LANGUAGE_TOKENS: string[] = [...SUBTITLE_TOKEN_TO_CODE.keys()].sort((a, b) => b.length - a.length);

/**
 * Get full language name from ISO code or full name
 * @returns Full language name (e.g., 'Hindi') or undefined if not found
 */
export function getLanguageName(code: string | null | undefined): string | undefined {
  if (!code) return undefined;
  const lowerCode = code.toLowerCase();
  if (LANGUAGE_NAMES[lowerCode]) {
    return LANGUAGE_NAMES[lowerCode];
  }
  const capitalized = code.charAt(0).toUpperCase() + code.slice(1).toLowerCase();
  if (LANGUAGE_NAME_TO_CODE[capitalized]) {
    return capitalized;
  }
  return code.toUpperCase(); // Fallback to uppercase original if no mapping
}

/**
 * Get ISO code from language (handles ISO codes, full names and release markers)
 * @returns ISO code (e.g., 'fr') or undefined if the language is not known
 */
export function getLanguageCode(language: string | null | undefined): string | undefined {
  if (!language) return undefined;
  const lowerLang = language.toLowerCase();
  if (LANGUAGE_NAMES[lowerLang]) {
    return lowerLang;
  }
  const capitalized = language.charAt(0).toUpperCase() + language.slice(1).toLowerCase();
  return LANGUAGE_NAME_TO_CODE[capitalized] || AUDIO_TOKEN_TO_CODE.get(lowerLang);
}

/**
 * Map a subtitle marker ("vostfr", "subita") to its ISO code
 */
export function getSubtitleLanguageCode(token: string): string | undefined {
  return SUBTITLE_TOKEN_TO_CODE.get(token.toLowerCase());
}
