import { HdrFormat, ParsedName, Resolution } from '../types/ParsedName';
import { normalizeAudioCodec, normalizeVideoCodec } from '../utils/codecMapping';
import {
  AUDIO_LANGUAGE_TOKENS,
  SUBTITLE_LANGUAGE_TOKENS,
  getLanguageCode,
  getSubtitleLanguageCode,
} from '../utils/languageMapping';
import {
  TokenMatch,
  WorkingName,
  blank,
  blankAll,
  escapeRegExp,
  findTokens,
} from './workingName';

// Separator between parts of a single token ("WEB-DL", "WEB.DL", "Blu Ray")
const SEP = '[ ._-]';

export interface StepResult {
  working: WorkingName;
  fields: Partial<ParsedName>;
}

export interface YearToken {
  value: number;
  start: number;
  end: number;
}

export interface ParseContext {
  year?: YearToken;
  /** Group taken from a leading `[Group]`; a trailing group does not replace it */
  leadingGroup?: string;
}

export interface ExtractionStep {
  name: string;
  run(working: WorkingName, context: ParseContext): StepResult;
}

interface TokenRule<T> {
  pattern: string;
  value: (match: RegExpExecArray) => T | undefined;
  /** Ambiguous tokens are only trusted inside the technical zone */
  zoneOnly?: boolean;
}

function constant<T>(value: T): () => T {
  return () => value;
}

/**
 * One attribute family. The first rule (in list order) with a match decides the
 * value; every rule's matches are blanked so none of them leak into the title.
 */
function familyStep<T>(name: string, rules: TokenRule<T>[], assign: (value: T) => Partial<ParsedName>): ExtractionStep {
  return {
    name,
    run(working) {
      let value: T | undefined;
      const matched: TokenMatch[] = [];
      for (const rule of rules) {
        const matches = findTokens(working, rule.pattern, rule.zoneOnly);
        if (matches.length === 0) continue;
        if (value === undefined) {
          value = rule.value(matches[0].match);
        }
        matched.push(...matches);
      }
      return {
        working: blankAll(working, matched),
        fields: value === undefined ? {} : assign(value),
      };
    },
  };
}

const RESOLUTION_BY_LINES: Record<string, Resolution> = {
  '2160': '2160p',
  '1080': '1080p',
  '720': '720p',
  '576': '576p',
  '480': '480p',
  '360': '360p',
};

const RESOLUTION_RULES: TokenRule<Resolution>[] = [
  { pattern: '(2160|1080|720|576|480|360)[pi]', value: (m) => RESOLUTION_BY_LINES[m[1]] },
  { pattern: '4K|UHD', value: constant<Resolution>('2160p'), zoneOnly: true },
  { pattern: 'FHD', value: constant<Resolution>('1080p'), zoneOnly: true },
];

const HDR_RULES: TokenRule<HdrFormat>[] = [
  { pattern: `Dolby${SEP}?Vision|DoVi`, value: constant<HdrFormat>('dolby_vision') },
  { pattern: 'DV', value: constant<HdrFormat>('dolby_vision'), zoneOnly: true },
  { pattern: `HDR10(?:\\+|${SEP}?Plus)`, value: constant<HdrFormat>('hdr10+') },
  { pattern: 'HDR10', value: constant<HdrFormat>('hdr10') },
  { pattern: 'HDR', value: constant<HdrFormat>('hdr10'), zoneOnly: true },
  { pattern: 'SDR', value: constant<HdrFormat>('none'), zoneOnly: true },
];

const VIDEO_CODEC_RULES: TokenRule<string>[] = [
  { pattern: '[xh]\\.?26[45]|HEVC', value: (m) => normalizeVideoCodec(m[0]) },
  { pattern: 'AVC|AV1|VP9|XviD|DivX|VC-?1|MPEG-?2', value: (m) => normalizeVideoCodec(m[0]), zoneOnly: true },
];

const AUDIO_CODEC_PATTERN =
  `(DDP|DD\\+|E-?AC-?3|TrueHD|DTS-HD${SEP}?MA|DTS-HD|DTS-X|DTS|AC-?3|DD|AAC|FLAC|MP3|Opus|L?PCM)` +
  `(?:${SEP}?(\\d\\.\\d))?(?:${SEP}?Atmos)?`;

const SOURCE_RULES: TokenRule<string>[] = [
  { pattern: 'Remux', value: constant('Remux') },
  { pattern: `Blu${SEP}?Ray|BDRip|BRRip`, value: constant('BluRay') },
  { pattern: `WEB${SEP}?DL(?:Rip)?`, value: constant('WEB-DL') },
  { pattern: `WEB${SEP}?Rip`, value: constant('WEBRip') },
  { pattern: 'HDTV|PDTV', value: constant('HDTV') },
  { pattern: `DVD${SEP}?Rip`, value: constant('DVDRip') },
  { pattern: 'DVD(?:5|9|R)?', value: constant('DVD') },
  { pattern: 'WEB', value: constant('WEB'), zoneOnly: true },
  { pattern: 'BD', value: constant('BluRay'), zoneOnly: true },
];

const PLATFORM_RULES: TokenRule<string>[] = [
  { pattern: 'AMZN|Amazon', value: constant('AMZN') },
  { pattern: 'NF|Netflix', value: constant('NF') },
  { pattern: 'DSNP|DSNY|Disney\\+', value: constant('DSNP') },
  { pattern: 'HMAX', value: constant('HMAX') },
  { pattern: 'ATVP', value: constant('ATVP') },
  { pattern: 'HULU', value: constant('HULU') },
  { pattern: 'PCOK', value: constant('PCOK') },
  { pattern: 'CR|Crunchyroll', value: constant('CR') },
].map((rule) => ({ ...rule, zoneOnly: true }));

const EDITION_RULES: TokenRule<string>[] = [
  { pattern: `Extended(?:${SEP}(?:Cut|Edition))?`, value: constant('Extended') },
  { pattern: `Director'?s${SEP}Cut|DC`, value: constant("Director's Cut") },
  { pattern: 'Unrated', value: constant('Unrated') },
  { pattern: 'Remastered', value: constant('Remastered') },
  { pattern: 'IMAX', value: constant('IMAX') },
  { pattern: `Theatrical(?:${SEP}Cut)?`, value: constant('Theatrical') },
].map((rule) => ({ ...rule, zoneOnly: true }));

const NOISE_PATTERN =
  `PROPER|REPACK|RERIP|iNTERNAL|READ${SEP}?NFO|SUBFORCED|COMPLETE|HYBRID|LIMITED|DUBBED|SUBBED|` +
  `1[02]${SEP}?bits?|8${SEP}?bits?|Atmos|HC`;

/** Unambiguous tokens; the earliest of these (or the year) opens the technical zone. */
export const ANCHOR_PATTERNS: string[] = [
  RESOLUTION_RULES[0].pattern,
  VIDEO_CODEC_RULES[0].pattern,
  ...SOURCE_RULES.filter((rule) => !rule.zoneOnly).map((rule) => rule.pattern),
  `Dolby${SEP}?Vision|DoVi|HDR10`,
  `S\\d{1,2}${SEP}?E\\d{1,3}`,
  '\\d{1,2}x\\d{2,3}',
  'S\\d{1,2}',
  `Season${SEP}?\\d{1,2}`,
];

const YEAR_PATTERN = '(?:19|20)\\d{2}';

const ONLY_SEPARATORS = /^[\s._-]*$/;
const SEPARATOR_CHAR = /[\s._-]/;
const SPACE_CHAR = /\s/;

/** Start of the run of `chars` that ends at `end` (`end` itself when there is none). */
function runStart(text: string, end: number, chars: RegExp): number {
  let start = end;
  while (start > 0 && chars.test(text[start - 1])) start--;
  return start;
}

interface Anchor {
  start: number;
  end: number;
}

function findAnchors(working: WorkingName): Anchor[] {
  return ANCHOR_PATTERNS.flatMap((pattern) => findTokens(working, pattern).map(({ start, end }) => ({ start, end })));
}

/**
 * Find the release year: a 4-digit 1900-2099 token that is not the first thing
 * in the name and is bracketed, next to an unambiguous technical token, or part
 * of a dotted name (`Movie.Title.2020.FRENCH`). The last such token wins, so
 * numeric titles keep their number. A spaced title with a bare trailing year
 * keeps it, which is what a title that went through here once looks like.
 */
export function locateYear(working: WorkingName): YearToken | undefined {
  const anchors = findAnchors(working);
  const lastAnchor = anchors.reduce((latest, anchor) => Math.max(latest, anchor.start), -1);
  const anchorEnds = new Set(anchors.map((anchor) => anchor.end));
  const firstContent = working.folded.search(/[\p{L}\p{N}]/u);
  const dotted = !/\s/.test(working.folded) && /[._]/.test(working.folded);

  let accepted: YearToken | undefined;
  for (const token of findTokens(working, YEAR_PATTERN)) {
    if (token.start <= firstContent) continue;

    const before = working.folded[token.start - 1];
    const after = working.folded[token.end];
    const bracketed = (before === '(' && after === ')') || (before === '[' && after === ']');
    const afterAnchor = anchorEnds.has(runStart(working.folded, token.start, SEPARATOR_CHAR));
    if (!bracketed && !afterAnchor && !dotted && lastAnchor < token.end) continue;

    accepted = {
      value: parseInt(token.match[0], 10),
      start: bracketed ? token.start - 1 : token.start,
      end: bracketed ? token.end + 1 : token.end,
    };
  }
  return accepted;
}

export function locateZoneStart(working: WorkingName, year: YearToken | undefined): number {
  const start = findAnchors(working).reduce((earliest, anchor) => Math.min(earliest, anchor.start), Infinity);
  return year ? Math.min(start, year.start) : start;
}

const LEADING_GROUP = /^\[([^\]]+)\]/u;
const LEADING_SEPARATORS = /^[\s_]*/u;
// Starts only at the beginning of a whitespace run, so a long run is scanned once
const EPISODE_SEPARATOR = /(?<![\s_])[\s_]+-[\s_]+(\d{1,4})(?:v\d)?(?![\p{L}\p{N}])/u;

/**
 * Leading `[Group]`, and the anime layout `[Group] Title - 05` when an episode
 * number follows the first ` - `.
 */
const releaseHeadStep: ExtractionStep = {
  name: 'releaseHead',
  run(working, context) {
    const leading = LEADING_GROUP.exec(working.folded);
    if (!leading) return { working, fields: {} };

    const group = working.display.slice(1, leading[1].length + 1).trim();
    if (group) context.leadingGroup = group;
    const groupEnd = leading[0].length;
    const titleStart = groupEnd + (LEADING_SEPARATORS.exec(working.folded.slice(groupEnd))?.[0].length ?? 0);
    const episode = EPISODE_SEPARATOR.exec(working.folded.slice(titleStart));

    if (episode && episode.index > 0) {
      const titleEnd = titleStart + episode.index;
      let next = blank(working, 0, titleStart, false);
      next = blank(next, titleEnd, titleEnd + episode[0].length, true);
      const fields: Partial<ParsedName> = { contentType: 'anime', episode: parseInt(episode[1], 10) };
      if (group) fields.releaseGroup = group;
      return { working: next, fields };
    }

    return {
      working: blank(working, 0, groupEnd, false),
      fields: group ? { releaseGroup: group } : {},
    };
  },
};

const audioCodecStep: ExtractionStep = {
  name: 'audioCodec',
  run(working) {
    const matches = findTokens(working, AUDIO_CODEC_PATTERN, true);
    if (matches.length === 0) return { working, fields: {} };
    const [first] = matches;
    const fields: Partial<ParsedName> = { audioCodec: normalizeAudioCodec(first.match[1]) };
    if (first.match[2]) fields.audioChannels = first.match[2];
    return { working: blankAll(working, matches), fields };
  },
};

const noiseStep: ExtractionStep = {
  name: 'noise',
  run(working) {
    const matches = [
      ...findTokens(working, NOISE_PATTERN, true),
      // CRC32 checksums, mostly in anime releases
      ...findTokens(working, /\[[0-9A-F]{8}\]/giu),
    ];
    return { working: blankAll(working, matches), fields: {} };
  },
};

function dedupe(codes: Array<string | undefined>): string[] {
  const seen: string[] = [];
  for (const code of codes) {
    if (code && !seen.includes(code)) seen.push(code);
  }
  return seen;
}

const subtitleStep: ExtractionStep = {
  name: 'subtitles',
  run(working) {
    const matches = findTokens(working, SUBTITLE_LANGUAGE_TOKENS.map(escapeRegExp).join('|'), true);
    return {
      working: blankAll(working, matches),
      fields: { subtitles: dedupe(matches.map((m) => getSubtitleLanguageCode(m.match[0]))) },
    };
  },
};

const languageStep: ExtractionStep = {
  name: 'languages',
  run(working) {
    const multi = findTokens(working, 'MULTi(?:3|LANG)?', true);
    const matches = findTokens(working, AUDIO_LANGUAGE_TOKENS.map(escapeRegExp).join('|'), true);
    return {
      working: blankAll(working, [...multi, ...matches]),
      fields: {
        languages: dedupe(matches.map((m) => getLanguageCode(m.match[0]))),
        multiLanguage: multi.length > 0,
      },
    };
  },
};

/**
 * Without a season marker, a bare "Episode N" only counts after ` - ` or right
 * before a technical token; otherwise it is part of a title ("Star Wars
 * Episode 4").
 */
function isEpisodeMarker(working: WorkingName, token: TokenMatch): boolean {
  const dash = runStart(working.folded, token.start, SPACE_CHAR) - 1;
  if (working.folded[dash] === '-' && SPACE_CHAR.test(working.folded.charAt(dash - 1))) return true;

  const following = working.spans.filter((span) => span.technical && span.start >= token.end).map((span) => span.start);
  if (following.length === 0) return false;
  return ONLY_SEPARATORS.test(working.folded.slice(token.end, Math.min(...following)));
}

/** Season/episode markers: SxxEyy, 1x01, bare "Episode N" and season packs. */
const seasonEpisodeStep: ExtractionStep = {
  name: 'seasonEpisode',
  run(working) {
    const standard = findTokens(working, `S(\\d{1,2})${SEP}?E(\\d{1,3})(?:${SEP}?-?E\\d{1,3})*`);
    const crossed = findTokens(working, '(\\d{1,2})x(\\d{2,3})');
    const pack = [
      ...findTokens(working, 'S(\\d{1,2})'),
      ...findTokens(working, `Season${SEP}?(\\d{1,2})`),
    ];
    const bareEpisode = findTokens(working, `(?:Episode|Ep)${SEP}?(\\d{1,4})`).filter(
      (m) => pack.length > 0 || isEpisodeMarker(working, m)
    );

    const episodic = standard[0] ?? crossed[0];
    let season: number | undefined;
    let episode: number | undefined;
    if (episodic) {
      season = parseInt(episodic.match[1], 10);
      episode = parseInt(episodic.match[2], 10);
    } else {
      if (pack[0]) season = parseInt(pack[0].match[1], 10);
      if (bareEpisode[0]) episode = parseInt(bareEpisode[0].match[1], 10);
    }

    const matched = [...standard, ...crossed, ...bareEpisode, ...pack];
    const fields: Partial<ParsedName> = {};
    if (season !== undefined) fields.season = season;
    if (episode !== undefined) fields.episode = episode;
    if (season !== undefined || episode !== undefined) {
      fields.fullSeason = season !== undefined && episode === undefined;
    }
    return { working: blankAll(working, matched), fields };
  },
};

const yearStep: ExtractionStep = {
  name: 'year',
  run(working, context) {
    if (!context.year) return { working, fields: {} };
    return {
      working: blank(working, context.year.start, context.year.end, true),
      fields: { year: context.year.value },
    };
  },
};

const TRAILING_DASH_GROUP = /-([\p{L}\p{N}]+)$/u;

interface TrailingGroup {
  start: number;
  end: number;
  raw: string;
  rawStart: number;
}

function findTrailingGroup(folded: string): TrailingGroup | undefined {
  const trimmed = folded.trimEnd();
  if (trimmed.endsWith(']')) {
    const open = trimmed.lastIndexOf('[');
    const raw = trimmed.slice(open + 1, -1);
    if (open < 0 || !raw || raw.includes(']')) return undefined;
    return { start: open, end: folded.length, raw, rawStart: open + 1 };
  }
  const dash = TRAILING_DASH_GROUP.exec(trimmed);
  if (!dash) return undefined;
  return { start: dash.index, end: folded.length, raw: dash[1], rawStart: dash.index + 1 };
}

/**
 * Release group suffix ("-GROUP" or "[GROUP]"). Stripped when written in
 * uppercase or when the name already carried technical tokens, so a
 * hyphenated title word ("Spider-Man") survives on its own. A group found at
 * the front of the name wins.
 */
const releaseGroupStep: ExtractionStep = {
  name: 'releaseGroup',
  run(working, context) {
    if (context.leadingGroup) return { working, fields: {} };
    const match = findTrailingGroup(working.folded);
    if (!match || match.start === 0) return { working, fields: {} };
    if (!/[\p{L}\p{N}]/u.test(working.folded.slice(0, match.start))) return { working, fields: {} };

    const group = working.display.slice(match.rawStart, match.rawStart + match.raw.length).trim();
    const uppercase = /\p{L}/u.test(group) && group === group.toUpperCase();
    const hasTechnical = working.spans.some((span) => span.technical);
    if (!group || (!uppercase && !hasTechnical)) return { working, fields: {} };

    return {
      working: blank(working, match.start, match.end, false),
      fields: { releaseGroup: group },
    };
  },
};

/** Extraction order matters: each step only sees what earlier steps left behind. */
export const EXTRACTION_STEPS: ExtractionStep[] = [
  releaseHeadStep,
  familyStep('resolution', RESOLUTION_RULES, (resolution) => ({ resolution })),
  familyStep('hdr', HDR_RULES, (hdr) => ({ hdr })),
  familyStep('videoCodec', VIDEO_CODEC_RULES, (videoCodec) => ({ videoCodec })),
  audioCodecStep,
  familyStep('source', SOURCE_RULES, (source) => ({ source })),
  familyStep('platform', PLATFORM_RULES, (platform) => ({ platform })),
  familyStep('edition', EDITION_RULES, (edition) => ({ edition })),
  noiseStep,
  subtitleStep,
  languageStep,
  seasonEpisodeStep,
  yearStep,
  releaseGroupStep,
];
