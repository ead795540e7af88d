import { ContentType, ParsedName } from '../types/ParsedName';
import { EXTRACTION_STEPS, ParseContext, locateYear, locateZoneStart } from './extractors';
import { WorkingName, createWorkingName, withZoneStart } from './workingName';

const CONTAINER_EXTENSION = /\.(mkv|mp4|avi|m4v|ts|wmv|mov|webm)$/i;

/**
 * Keep the last path segment and drop a video container extension.
 */
export function releaseBaseName(name: string): string {
  const segments = name.split(/[\\/]/).filter((segment) => segment.trim().length > 0);
  const base = segments.length > 0 ? segments[segments.length - 1] : name;
  return base.replace(CONTAINER_EXTENSION, '');
}

const EDGE_PUNCTUATION = /[\s,;:+&]/;

function trimEdgePunctuation(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && EDGE_PUNCTUATION.test(text[start])) start++;
  while (end > start && EDGE_PUNCTUATION.test(text[end - 1])) end--;
  return text.slice(start, end);
}

/**
 * Turn what is left of a name into a title: separators become spaces, empty
 * brackets go away and whitespace is collapsed.
 */
export function cleanTitle(text: string): string {
  return trimEdgePunctuation(
    text
      .replace(/[._-]+/g, ' ')
      .replace(/\(\s*\)|\[\s*\]|\{\s*\}/g, ' ')
      .replace(/\s+/g, ' ')
  );
}

function extractTitle(working: WorkingName, base: string, input: string): string {
  const technicalStarts = working.spans.filter((span) => span.technical).map((span) => span.start);
  const cut = technicalStarts.length > 0 ? Math.min(...technicalStarts) : working.display.length;

  return (
    cleanTitle(working.display.slice(0, cut)) ||
    cleanTitle(working.display) ||
    cleanTitle(base.normalize('NFC')) ||
    input.trim() ||
    input
  );
}

function classify(fields: Partial<ParsedName>, working: WorkingName): ContentType {
  if (fields.contentType === 'anime') return 'anime';
  if (fields.season !== undefined || fields.episode !== undefined) return 'series';
  if (working.spans.some((span) => span.technical)) return 'movie';
  return 'unknown';
}

/**
 * Parse a release filename or folder name into structured attributes.
 *
 * Never throws. A name with no recognizable token comes back as
 * `contentType: 'unknown'` with the whole name, lightly cleaned, as the title.
 */
export function analyzeReleaseName(name: string): ParsedName {
  const base = releaseBaseName(name);
  let working = createWorkingName(base);

  const context: ParseContext = { year: locateYear(working) };
  working = withZoneStart(working, locateZoneStart(working, context.year));

  let fields: Partial<ParsedName> = {};
  for (const step of EXTRACTION_STEPS) {
    const result = step.run(working, context);
    working = result.working;
    fields = { ...fields, ...result.fields };
  }

  return {
    rawTitle: extractTitle(working, base, name),
    contentType: classify(fields, working),
    year: fields.year,
    season: fields.season,
    episode: fields.episode,
    fullSeason: fields.fullSeason ?? false,
    resolution: fields.resolution,
    videoCodec: fields.videoCodec,
    audioCodec: fields.audioCodec,
    audioChannels: fields.audioChannels,
    hdr: fields.hdr,
    source: fields.source,
    platform: fields.platform,
    edition: fields.edition,
    releaseGroup: fields.releaseGroup,
    languages: fields.languages ?? [],
    subtitles: fields.subtitles ?? [],
    multiLanguage: fields.multiLanguage ?? false,
  };
}
